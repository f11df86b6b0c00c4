import "dotenv/config";
import path from "path";
import express from "express";
import helmet from "helmet";
import cors from "cors";
import compression from "compression";
import rateLimit from "express-rate-limit";
import { requestLogger } from "./src/middlewares/logger.middleware";
import { logger } from "./src/utils/logger";
import { errorMiddleware } from "./src/middlewares/error.middleware";
import { loadConfig } from "./src/configs/environment";
import { RunningCoachApplication } from "./src/main";
import routes from "./src/routes";

const config = loadConfig();
const app = express();

app.use(helmet());
app.use(cors({ origin: config.api.cors.origin }));
app.use(compression());
// screenshots arrive base64-encoded in the JSON body
app.use(express.json({ limit: "10mb" }));
app.use(
  rateLimit({
    windowMs: config.api.rateLimit.windowMs,
    max: config.api.rateLimit.max,
    standardHeaders: true,
    legacyHeaders: false,
  })
);
app.use(requestLogger);

app.use("/assets", express.static(path.resolve(__dirname, "assets")));
app.use("/", routes);

// Error middleware should be last
app.use(errorMiddleware);

const coachApp = new RunningCoachApplication();
if (coachApp.initialize()) {
  app.listen(config.port, () =>
    logger.info(`Running coach service started on port ${config.port}`)
  );
} else {
  process.exit(1);
}
