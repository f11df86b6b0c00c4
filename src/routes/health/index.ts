import express from "express";
import { loadConfig } from "../../configs/environment";

const config = loadConfig();
const healthRouter = express.Router();

healthRouter.get("/", (_req, res) => {
  res.json({
    success: true,
    message: "Running coach service is healthy",
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
    environment: config.nodeEnv,
  });
});

healthRouter.get("/status", (_req, res) => {
  res.json({
    success: true,
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
    services: {
      openai: config.openai.apiKey ? "configured" : "not_configured",
      model: config.openai.model,
      database: config.database.path,
    },
    endpoints: {
      plans: "/api/v1/plans",
      generate: "/api/v1/plans/generate",
    },
  });
});

export default healthRouter;
