import { bearingDegrees, centroid, distanceMiles, headingDelta, mean, variance } from "./geo.js";
import type { TrackPoint } from "./trackStore.js";
import type { FlightPattern, RiskLevel } from "./types.js";

export interface PatternOptions {
  circlingMinSamples: number;
  /** Heading changes smaller than this are jitter, not turns. */
  minTurnDeltaDeg: number;
  circlingMinConfidence: number;
  circlingMinRadiusMiles: number;
  searchMinSamples: number;
  searchWindow: number;
  reversalDeg: number;
  straightLegDeg: number;
  searchMinConfidence: number;
}

export const DEFAULT_PATTERN_OPTIONS: PatternOptions = {
  circlingMinSamples: 20,
  minTurnDeltaDeg: 5,
  circlingMinConfidence: 0.5,
  circlingMinRadiusMiles: 0.5,
  searchMinSamples: 30,
  searchWindow: 50,
  reversalDeg: 150,
  straightLegDeg: 10,
  searchMinConfidence: 0.4,
};

/**
 * Heading for each sample: the reported track where the feed gave one,
 * otherwise the bearing flown from the previous sample.
 */
export function headingsOf(points: TrackPoint[]): number[] {
  return points.map((p, i) => {
    if (p.track !== undefined) return p.track;
    if (i === 0) {
      const next = points[1];
      return next ? bearingDegrees(p.lat, p.lon, next.lat, next.lon) : 0;
    }
    const prev = points[i - 1];
    return bearingDegrees(prev.lat, prev.lon, p.lat, p.lon);
  });
}

function minutesSpanned(points: TrackPoint[]): number {
  return (points[points.length - 1].timestamp - points[0].timestamp) / 60_000;
}

function circlingRisk(radius: number, turnRate: number): RiskLevel {
  if (radius < 2 && turnRate > 10) return "HIGH";
  if (radius < 5 && turnRate > 6) return "MEDIUM";
  return "LOW";
}

/**
 * Scores the last `circlingMinSamples` positions for sustained one-way
 * turning around a fixed centre. Returns null when there is not enough
 * history or the score is below the circling threshold.
 */
export function classifyCircling(
  window: TrackPoint[],
  options: PatternOptions = DEFAULT_PATTERN_OPTIONS
): FlightPattern | null {
  if (window.length < options.circlingMinSamples) return null;
  const points = window.slice(-options.circlingMinSamples);

  const center = centroid(points);
  const radii = points.map((p) => distanceMiles(center.lat, center.lon, p.lat, p.lon));
  const avgRadius = mean(radii);
  if (avgRadius <= 0) return null;
  const radiusConsistency = 1 - Math.min(variance(radii) / avgRadius ** 2, 1);

  const headings = headingsOf(points);
  const deltas: number[] = [];
  for (let i = 1; i < headings.length; i++) {
    deltas.push(headingDelta(headings[i - 1], headings[i]));
  }
  const totalTurn = deltas.reduce((sum, d) => sum + d, 0);
  const rightTurns = deltas.filter((d) => d > options.minTurnDeltaDeg).length;
  const leftTurns = deltas.filter((d) => d < -options.minTurnDeltaDeg).length;
  const turnConsistency = Math.max(rightTurns, leftTurns) / deltas.length;

  const minutes = minutesSpanned(points);
  const turnRate = minutes > 0 ? Math.abs(totalTurn) / minutes : 0;

  const first = points[0];
  const last = points[points.length - 1];
  const closure = Math.max(0, 1 - distanceMiles(first.lat, first.lon, last.lat, last.lon) / avgRadius);

  const confidence = radiusConsistency * 0.3 + turnConsistency * 0.4 + (turnRate > 3 ? 0.2 : 0) + closure * 0.1;

  if (confidence < options.circlingMinConfidence || avgRadius <= options.circlingMinRadiusMiles) {
    return null;
  }

  const type = totalTurn > 0 ? "circling_right" : "circling_left";
  const riskLevel = circlingRisk(avgRadius, turnRate);
  let description = `Circling ${type === "circling_right" ? "right" : "left"} with ${avgRadius.toFixed(1)} mile radius`;
  if (riskLevel === "HIGH") description += ", tight orbit";
  else if (riskLevel === "MEDIUM") description += ", sustained orbit";

  return {
    type,
    confidence,
    centerLat: center.lat,
    centerLon: center.lon,
    radiusMiles: avgRadius,
    durationMinutes: minutes,
    turnRate,
    description,
    riskLevel,
  };
}

/**
 * Back-and-forth survey legs: frequent near-180° reversals separated by
 * straight runs. The reported radius is the bounding box half-diagonal.
 */
export function classifySearchPattern(
  window: TrackPoint[],
  options: PatternOptions = DEFAULT_PATTERN_OPTIONS
): FlightPattern | null {
  if (window.length < options.searchMinSamples) return null;
  const points = window.slice(-options.searchWindow);
  const headings = headingsOf(points);

  let reversals = 0;
  let straightLegs = 0;
  for (let i = 2; i < headings.length; i++) {
    const [h1, h2, h3] = [headings[i - 2], headings[i - 1], headings[i]];
    if (Math.abs(headingDelta(h1, h3)) >= options.reversalDeg) reversals++;
    if (Math.abs(headingDelta(h1, h2)) < options.straightLegDeg && Math.abs(headingDelta(h2, h3)) < options.straightLegDeg) {
      straightLegs++;
    }
  }

  const reversalRate = reversals / points.length;
  const legRate = straightLegs / points.length;
  if (reversalRate <= 0.1 || legRate <= 0.3) return null;

  const confidence = Math.min((reversalRate * 5 + legRate) * 0.5, 1);
  if (confidence <= options.searchMinConfidence) return null;

  const lats = points.map((p) => p.lat);
  const lons = points.map((p) => p.lon);
  const [minLat, maxLat, minLon, maxLon] = [Math.min(...lats), Math.max(...lats), Math.min(...lons), Math.max(...lons)];
  const halfDiagonal = distanceMiles(minLat, minLon, maxLat, maxLon) / 2;

  return {
    type: "search_pattern",
    confidence,
    centerLat: (minLat + maxLat) / 2,
    centerLon: (minLon + maxLon) / 2,
    radiusMiles: halfDiagonal,
    durationMinutes: minutesSpanned(points),
    turnRate: 0,
    description: `Search/survey pattern covering ${halfDiagonal.toFixed(1)} miles from centre (${reversals} reversals)`,
    riskLevel: "LOW",
  };
}

export function classifyPatterns(
  window: TrackPoint[],
  options: PatternOptions = DEFAULT_PATTERN_OPTIONS
): FlightPattern[] {
  const found: FlightPattern[] = [];
  const circling = classifyCircling(window, options);
  if (circling) found.push(circling);
  const search = classifySearchPattern(window, options);
  if (search) found.push(search);
  return found;
}
