import { z } from "zod";
import { RunningPlan } from "../types/model/runningPlan.model";
import { PlanStructureError } from "../utils/errors";

export const dailyMealSchema = z.object({
  suggestion: z.string(),
  calories: z.string(),
});

export const dailyPlanSchema = z.object({
  day: z.string(),
  titles: z.string(),
  details: z.string(),
  breakfast: dailyMealSchema,
  lunch: dailyMealSchema,
  dinner: dailyMealSchema,
});

export const weeklyPlanSchema = z
  .array(dailyPlanSchema)
  .min(1, "a week must contain at least one day");

/**
 * Target shape requested from the model and the decoder for its output.
 * Both the structured decoding step and the later structure check go
 * through this one schema.
 */
export const runningPlanSchema = z.object({
  motivation: z.string(),
  feedback: z.string(),
  supplement_suggestion: z.string(),
  plan: z
    .array(weeklyPlanSchema)
    .min(1, "plan must contain at least one week"),
});

const describeIssues = (error: z.ZodError): string[] =>
  error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });

export const parseRunningPlan = (value: unknown): RunningPlan => {
  const parsed = runningPlanSchema.safeParse(value);
  if (!parsed.success) {
    const issues = describeIssues(parsed.error);
    throw new PlanStructureError(
      `Plan does not match the expected structure: ${issues.join(", ")}`,
      issues
    );
  }
  return parsed.data;
};

export const validatePlanStructure = (value: unknown): boolean =>
  runningPlanSchema.safeParse(value).success;
