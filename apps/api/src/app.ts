import cors from "cors";
import express from "express";
import { createSchoolsRouter } from "./routes/schools.js";
import type { SchoolFinderService } from "./types/domain.js";

export const createApp = (service: SchoolFinderService) => {
  const app = express();

  app.use(cors());
  app.use(express.json());

  app.get("/api/health", (_, res) => {
    res.json({ ok: true, now: new Date().toISOString() });
  });

  app.use("/api/schools", createSchoolsRouter(service));

  return app;
};
