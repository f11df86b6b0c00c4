import dotenv from "dotenv";
import { z } from "zod";
import { ConfigurationError } from "../utils/errors";

dotenv.config();

const numeric = z.string().regex(/^\d+$/, "must be a whole number").optional();

const envSchema = z.object({
  PORT: numeric,
  NODE_ENV: z.string().optional(),

  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().optional(),
  OPENAI_TIMEOUT_MS: numeric,

  DATABASE_PATH: z.string().optional(),
  IMAGE_PATH: z.string().optional(),
  OUTPUT_DIR: z.string().optional(),
  HTML_OUTPUT_FILE: z.string().optional(),
  JSON_OUTPUT_FILE: z.string().optional(),
  CSS_OUTPUT_FILE: z.string().optional(),

  LOG_LEVEL: z
    .enum(["error", "warn", "info", "http", "verbose", "debug", "silly"])
    .optional(),
  ENABLE_CONSOLE_LOG: z.string().optional(),
  ENABLE_FILE_LOG: z.string().optional(),

  RATE_LIMIT_WINDOW: numeric,
  RATE_LIMIT_MAX: numeric,
  CORS_ORIGIN: z.string().optional(),
});

// Placeholder shipped in .env.example
const API_KEY_PLACEHOLDER = "your-api-key-here";

export type AppConfig = ReturnType<typeof buildConfig>;

export const buildConfig = (env: NodeJS.ProcessEnv = process.env) => {
  return {
    port: parseInt(env.PORT || "3000", 10),
    nodeEnv: env.NODE_ENV || "development",
    openai: {
      apiKey:
        env.OPENAI_API_KEY && env.OPENAI_API_KEY !== API_KEY_PLACEHOLDER
          ? env.OPENAI_API_KEY
          : "",
      model: env.OPENAI_MODEL || "gpt-4o",
      timeoutMs: parseInt(env.OPENAI_TIMEOUT_MS || "60000", 10),
    },
    database: {
      path: env.DATABASE_PATH || "instance/running_coach.sqlite",
    },
    image: {
      path: env.IMAGE_PATH || "fitness_screenshot.png",
    },
    output: {
      dir: env.OUTPUT_DIR || ".",
      htmlFile: env.HTML_OUTPUT_FILE || "training_plan.html",
      jsonFile: env.JSON_OUTPUT_FILE || "training_plan.json",
      cssFile: env.CSS_OUTPUT_FILE || "style.css",
    },
    logging: {
      level: env.LOG_LEVEL || "info",
      enableConsole: env.ENABLE_CONSOLE_LOG !== "false",
      enableFile: env.ENABLE_FILE_LOG === "true",
    },
    api: {
      rateLimit: {
        windowMs: parseInt(env.RATE_LIMIT_WINDOW || "900000", 10),
        max: parseInt(env.RATE_LIMIT_MAX || "100", 10),
      },
      cors: {
        origin: env.CORS_ORIGIN?.split(",") || ["http://localhost:3000"],
      },
    },
  };
};

let cachedConfig: AppConfig | null = null;

export const loadConfig = (): AppConfig => {
  if (!cachedConfig) {
    cachedConfig = buildConfig();
  }
  return cachedConfig;
};

export const validateConfig = (env: NodeJS.ProcessEnv = process.env) => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join(", ");
    throw new ConfigurationError(
      `Invalid environment configuration: ${issues}`
    );
  }

  const config = buildConfig(env);
  if (!config.openai.apiKey) {
    throw new ConfigurationError("OPENAI_API_KEY is required", [
      "Copy .env.example to .env and add your OpenAI API key",
      "Or set the OPENAI_API_KEY environment variable",
    ]);
  }
  return config;
};
