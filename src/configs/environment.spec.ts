import { buildConfig, validateConfig } from "./environment";
import { ConfigurationError } from "../utils/errors";

describe("buildConfig", () => {
  it("falls back to the defaults", () => {
    const config = buildConfig({});

    expect(config.port).toBe(3000);
    expect(config.openai).toEqual({ apiKey: "", model: "gpt-4o", timeoutMs: 60000 });
    expect(config.database.path).toBe("instance/running_coach.sqlite");
    expect(config.image.path).toBe("fitness_screenshot.png");
    expect(config.output).toEqual({
      dir: ".",
      htmlFile: "training_plan.html",
      jsonFile: "training_plan.json",
      cssFile: "style.css",
    });
    expect(config.logging).toEqual({ level: "info", enableConsole: true, enableFile: false });
  });

  it("reads overrides from the environment", () => {
    const config = buildConfig({
      PORT: "8080",
      OPENAI_MODEL: "gpt-4o-mini",
      DATABASE_PATH: "/tmp/plans.sqlite",
      ENABLE_CONSOLE_LOG: "false",
      CORS_ORIGIN: "http://a.test,http://b.test",
    });

    expect(config.port).toBe(8080);
    expect(config.openai.model).toBe("gpt-4o-mini");
    expect(config.database.path).toBe("/tmp/plans.sqlite");
    expect(config.logging.enableConsole).toBe(false);
    expect(config.api.cors.origin).toEqual(["http://a.test", "http://b.test"]);
  });

  it("treats the example placeholder as a missing key", () => {
    expect(buildConfig({ OPENAI_API_KEY: "your-api-key-here" }).openai.apiKey).toBe("");
  });
});

describe("validateConfig", () => {
  it("returns the config when a key is present", () => {
    expect(validateConfig({ OPENAI_API_KEY: "test-secret" }).openai.apiKey).toBe("test-secret");
  });

  it("requires an API key", () => {
    expect(() => validateConfig({})).toThrow(new ConfigurationError("OPENAI_API_KEY is required"));
  });

  it("lists malformed values", () => {
    expect(() => validateConfig({ OPENAI_API_KEY: "test-secret", PORT: "eighty" })).toThrow(
      "Invalid environment configuration: PORT: must be a whole number"
    );
  });
});
