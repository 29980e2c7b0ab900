import express from "express";
import cors from "cors";
import { Services } from "../container";
import { createGenerationRouter } from "./routes/generation";
import { createProvisioningRouter } from "./routes/provisioning";
import { createQuestionsRouter } from "./routes/questions";

export function createApp(services: Services): express.Express {
  const app = express();

  // Middleware
  app.use(cors({ origin: true, credentials: true, maxAge: 86400 }));
  app.use(express.json({ limit: "5mb" }));

  // Routes
  app.use("/", createProvisioningRouter(services.provisioning, services.linker));
  app.use("/", createGenerationRouter(services.testSeries, services.coursePlans));
  app.use("/api/ai", createQuestionsRouter(services.questions));

  // Health check
  app.get("/api/health", (req, res) => {
    res.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  return app;
}
