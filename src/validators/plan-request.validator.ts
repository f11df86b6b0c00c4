import { z } from "zod";
import { PLAN_CONSTANTS } from "../utils/constants";
import { InputValidationError } from "../utils/errors";

export const goalQuerySchema = z
  .string()
  .superRefine((value, ctx) => {
    const trimmed = value.trim();
    if (!trimmed) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "Please enter a running goal",
      });
    } else if (trimmed.length < PLAN_CONSTANTS.MIN_QUERY_LENGTH) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "Please provide a more detailed running goal",
      });
    } else if (value.length > PLAN_CONSTANTS.MAX_QUERY_LENGTH) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Please keep your goal under ${PLAN_CONSTANTS.MAX_QUERY_LENGTH} characters`,
      });
    }
  })
  .transform((value) => value.trim());

export const generatePlanSchema = {
  body: z.object({
    query: goalQuerySchema,
    image: z
      .object({
        data: z
          .string()
          .min(1, "image.data is required")
          .regex(/^[A-Za-z0-9+/]+={0,2}$/, "image.data must be base64"),
        mimeType: z.enum(["image/png", "image/jpeg", "image/webp", "image/gif"]),
      })
      .optional(),
  }),
};

export type GeneratePlanBody = z.infer<typeof generatePlanSchema.body>;

export const planIdParamsSchema = {
  params: z.object({
    id: z.string().regex(/^[1-9]\d*$/, "id must be a positive integer"),
  }),
};

/**
 * Returns the trimmed goal or throws with the first problem found.
 */
export const validateUserInput = (query: string): string => {
  const parsed = goalQuerySchema.safeParse(query);
  if (!parsed.success) {
    throw new InputValidationError(parsed.error.issues[0].message);
  }
  return parsed.data;
};
