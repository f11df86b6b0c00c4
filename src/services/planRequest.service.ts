import { zodResponseFormat } from "openai/helpers/zod";
import type {
  ChatCompletionContentPart,
  ChatCompletionCreateParamsNonStreaming,
} from "openai/resources/chat/completions";
import { loadConfig } from "../configs/environment";
import { runningPlanSchema } from "../validators/running-plan.validator";
import { DEFAULT_IMAGE_MIME_TYPE, PLAN_CONSTANTS } from "../utils/constants";

const config = loadConfig();

export const SYSTEM_PROMPT =
  "You are an expert running coach. First, determine the total number of training weeks " +
  "required from the user's query. Then, generate a running plan with a 'motivation' message, " +
  "a 'feedback' message based on the stats shown in the uploaded image, a 'supplement_suggestion' " +
  "recommending the supplements the person should take for their best performance, and a 'plan' " +
  "list where each item represents one week's schedule. Match the number of weeks exactly, " +
  "no more and no fewer weeks. For every day, also include a breakfast, lunch and dinner " +
  "suggestion with the name of the meal and its calories.";

export interface PlanRequestDescriptor {
  model: string;
  instructions: string;
  userQuery: string;
  image: { dataUrl: string } | null;
  expectedWeeks: number | null;
  schema: typeof runningPlanSchema;
  schemaName: string;
}

export interface PlanRequestOptions {
  model?: string;
  mimeType?: string;
}

const WEEK_PATTERNS = [/(\d+)\s*weeks?/, /in\s*(\d+)\s*weeks?/, /(\d+)-week/];

/**
 * Best-effort week count from phrases like "in 8 weeks" or "12-week".
 * Counts outside 1..52 are ignored.
 */
export const extractWeeksFromQuery = (query: string): number | null => {
  const lowered = query.toLowerCase();
  for (const pattern of WEEK_PATTERNS) {
    const match = pattern.exec(lowered);
    if (!match) continue;

    const weeks = parseInt(match[1], 10);
    if (weeks >= PLAN_CONSTANTS.MIN_WEEKS && weeks <= PLAN_CONSTANTS.MAX_WEEKS) {
      return weeks;
    }
  }
  return null;
};

export const buildPlanRequest = (
  userQuery: string,
  encodedImage?: string | null,
  options: PlanRequestOptions = {}
): PlanRequestDescriptor => {
  const mimeType = options.mimeType || DEFAULT_IMAGE_MIME_TYPE;
  const query = userQuery.trim();

  return {
    model: options.model || config.openai.model,
    instructions: SYSTEM_PROMPT,
    userQuery: query,
    image: encodedImage
      ? { dataUrl: `data:${mimeType};base64,${encodedImage}` }
      : null,
    expectedWeeks: extractWeeksFromQuery(query),
    schema: runningPlanSchema,
    schemaName: PLAN_CONSTANTS.SCHEMA_NAME,
  };
};

export const toChatCompletionParams = (
  request: PlanRequestDescriptor
): ChatCompletionCreateParamsNonStreaming => {
  const content: ChatCompletionContentPart[] = [
    { type: "text", text: request.userQuery },
  ];
  if (request.image) {
    content.push({ type: "image_url", image_url: { url: request.image.dataUrl } });
  }

  return {
    model: request.model,
    messages: [
      { role: "system", content: request.instructions },
      { role: "user", content },
    ],
    response_format: zodResponseFormat(request.schema, request.schemaName),
  };
};
