import express from "express";
import { readFileSync } from "fs";
import path from "path";
import swaggerUi from "swagger-ui-express";

const swaggerOptions = {
  customCss: `
    .swagger-ui .topbar { display: none }
  `,
  customSiteTitle: "Squawkwatch API Documentation",
  swaggerOptions: {
    docExpansion: "none",
    defaultModelsExpandDepth: 1,
    tryItOutEnabled: true,
  },
};

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Serves the OpenAPI description of the status API under /docs. */
export function createDocsRouter(specPath = path.join(process.cwd(), "docs", "openapi.json")): express.Router {
  const document: unknown = JSON.parse(readFileSync(specPath, "utf8"));
  if (!isJsonObject(document)) {
    throw new Error(`${specPath} is not an OpenAPI document`);
  }

  const router = express.Router();
  router.get("/docs.json", (_req, res) => {
    res.json(document);
  });
  router.use("/docs", swaggerUi.serve, swaggerUi.setup(document, swaggerOptions));
  return router;
}
