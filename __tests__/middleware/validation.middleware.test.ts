import express, { Request, Response } from "express";
import request from "supertest";
import { describe, expect, it } from "vitest";
import {
  validate,
  validateParams,
  validateQuery,
} from "../../src/middleware/validation.middleware";
import {
  conflictParamsSchema,
  listBackupsQuerySchema,
  resolveConflictSchema,
} from "../../src/schemas/request.schemas";

const createApp = () => {
  const app = express();
  app.use(express.json());
  app.post("/resolve", validate(resolveConflictSchema), (req: Request, res: Response) => {
    res.json({ body: req.body });
  });
  app.get("/backups", validateQuery(listBackupsQuerySchema), (req: Request, res: Response) => {
    res.json({ query: req.validatedQuery });
  });
  app.get("/conflicts/:id", validateParams(conflictParamsSchema), (req: Request, res: Response) => {
    res.json({ id: req.params.id });
  });
  return app;
};

describe("validate", () => {
  it("replaces the body with the parsed value", async () => {
    const response = await request(createApp())
      .post("/resolve")
      .send({ strategy: "useRemote", notes: "checked with front desk" });

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      body: { strategy: "useRemote", notes: "checked with front desk" },
    });
  });

  it("reports every failing field", async () => {
    const response = await request(createApp()).post("/resolve").send({ strategy: "manual" });

    expect(response.status).toBe(400);
    expect(response.body).toEqual({
      error: "Validation failed",
      details: [{ field: "record", message: "record is required for manual resolution" }],
    });
  });
});

describe("validateQuery", () => {
  it("coerces query values", async () => {
    const response = await request(createApp()).get("/backups?kind=manual&limit=5");

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ query: { kind: "manual", limit: 5 } });
  });

  it("rejects values outside the schema", async () => {
    const response = await request(createApp()).get("/backups?limit=0");

    expect(response.status).toBe(400);
    expect(response.body.error).toBe("Query validation failed");
    expect(response.body.details[0].field).toBe("limit");
  });
});

describe("validateParams", () => {
  it("passes well-formed ids through", async () => {
    const response = await request(createApp()).get("/conflicts/patients_p1_1709287200000");

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ id: "patients_p1_1709287200000" });
  });

  it("rejects ids with unexpected characters", async () => {
    const response = await request(createApp()).get("/conflicts/patients%20p1");

    expect(response.status).toBe(400);
    expect(response.body).toEqual({
      error: "Path validation failed",
      details: [{ field: "id", message: "conflict id contains unexpected characters" }],
    });
  });
});
