import {
  generatePlanSchema,
  planIdParamsSchema,
  validateUserInput,
} from "./plan-request.validator";
import { InputValidationError } from "../utils/errors";

describe("validateUserInput", () => {
  it("returns the trimmed goal", () => {
    expect(validateUserInput("  run a 10k in 8 weeks  ")).toBe("run a 10k in 8 weeks");
  });

  it.each([
    ["", "Please enter a running goal"],
    ["    ", "Please enter a running goal"],
    ["5k", "Please provide a more detailed running goal"],
    ["x".repeat(501), "Please keep your goal under 500 characters"],
  ])("rejects %j", (query, message) => {
    expect(() => validateUserInput(query)).toThrow(new InputValidationError(message));
  });

  it("accepts exactly 500 characters", () => {
    expect(validateUserInput("a".repeat(500))).toHaveLength(500);
  });
});

describe("generatePlanSchema", () => {
  it("accepts an inline base64 image", () => {
    const parsed = generatePlanSchema.body.safeParse({
      query: "improve my 10K time in 8 weeks",
      image: { data: "aGVsbG8=", mimeType: "image/png" },
    });

    expect(parsed.success).toBe(true);
  });

  it("rejects an unsupported image type", () => {
    const parsed = generatePlanSchema.body.safeParse({
      query: "improve my 10K time in 8 weeks",
      image: { data: "aGVsbG8=", mimeType: "image/bmp" },
    });

    expect(parsed.success).toBe(false);
  });
});

describe("planIdParamsSchema", () => {
  it.each(["0", "-1", "abc", "1.5"])("rejects id %j", (id) => {
    expect(planIdParamsSchema.params.safeParse({ id }).success).toBe(false);
  });

  it("accepts a positive integer id", () => {
    expect(planIdParamsSchema.params.safeParse({ id: "42" }).success).toBe(true);
  });
});
