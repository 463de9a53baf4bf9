import express from "express";
import fs from "fs";
import os from "os";
import path from "path";
import type { Server } from "http";
import { afterEach, describe, expect, it } from "vitest";
import { createDocsRouter } from "../docsRouter.js";

describe("createDocsRouter()", () => {
  let server: Server | undefined;

  afterEach(async () => {
    const s = server;
    if (s) await new Promise<void>((resolve) => s.close(() => resolve()));
    server = undefined;
  });

  it("serves the bundled OpenAPI document", async () => {
    const app = express();
    app.use(createDocsRouter());
    const listening = await new Promise<Server>((resolve) => {
      const s = app.listen(0, "127.0.0.1", () => resolve(s));
    });
    server = listening;
    const address = listening.address();
    if (address === null || typeof address === "string") throw new Error("test server has no port");

    const body = await (await fetch(`http://127.0.0.1:${address.port}/docs.json`)).json();
    expect(body).toMatchObject({ openapi: "3.0.3", info: { title: "Squawkwatch status API" } });
  });

  it("rejects a document that is not an object", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "docs-"));
    const file = path.join(dir, "openapi.json");
    fs.writeFileSync(file, "[]");
    try {
      expect(() => createDocsRouter(file)).toThrow("is not an OpenAPI document");
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
