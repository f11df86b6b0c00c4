import OpenAI from "openai";
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
} from "openai/resources/chat/completions";
import { logger } from "../utils/logger";
import { loadConfig } from "../configs/environment";
import { RunningPlan } from "../types/model/runningPlan.model";
import { parseRunningPlan } from "../validators/running-plan.validator";
import {
  PlanRequestDescriptor,
  toChatCompletionParams,
} from "./planRequest.service";
import {
  ConfigurationError,
  ModelCallError,
  PlanStructureError,
  errorMessage,
} from "../utils/errors";

const config = loadConfig();

const TROUBLESHOOTING_HINTS = [
  "Check your internet connection",
  "Verify your OpenAI API key is correct",
  "Ensure you have sufficient API credits",
  "Try running again in a few minutes",
];

export interface ChatCompletionCreator {
  create(body: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletion>;
}

/**
 * Sends plan requests to the model and decodes the structured answer.
 */
export class PlanGeneratorService {
  private completions: ChatCompletionCreator | null = null;

  constructor(completions?: ChatCompletionCreator) {
    if (completions) {
      this.completions = completions;
    } else {
      this.initializeAI();
    }
  }

  private initializeAI(): void {
    if (!config.openai.apiKey) {
      logger.warn("OPENAI_API_KEY not configured. Plan generation is disabled.");
      return;
    }
    const client = new OpenAI({
      apiKey: config.openai.apiKey,
      timeout: config.openai.timeoutMs,
      maxRetries: 0,
    });
    this.completions = client.chat.completions;
    logger.info(`OpenAI client initialized (model ${config.openai.model}) ✅`);
  }

  async generatePlan(request: PlanRequestDescriptor): Promise<RunningPlan> {
    if (!this.completions) {
      throw new ConfigurationError("OPENAI_API_KEY is required", [
        "Set the OPENAI_API_KEY environment variable or add it to .env",
      ]);
    }

    logger.info(
      `Requesting plan from ${request.model} (image: ${request.image ? "yes" : "no"}, ` +
        `expected weeks: ${request.expectedWeeks ?? "unknown"})`
    );

    let completion: ChatCompletion;
    try {
      completion = await this.completions.create(toChatCompletionParams(request));
    } catch (error) {
      throw this.toModelCallError(error);
    }

    const message = completion.choices[0]?.message;
    if (!message) {
      throw new ModelCallError("Model returned no choices", {
        hints: TROUBLESHOOTING_HINTS,
      });
    }
    if (message.refusal) {
      throw new ModelCallError(`Model refused the request: ${message.refusal}`);
    }
    if (!message.content) {
      throw new PlanStructureError("Model returned an empty response");
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(message.content);
    } catch (error) {
      throw new PlanStructureError(
        `Model response is not valid JSON: ${errorMessage(error)}`
      );
    }

    const plan = parseRunningPlan(decoded);
    logger.info(`Plan decoded: ${plan.plan.length} week(s)`);
    return plan;
  }

  private toModelCallError(error: unknown): ModelCallError {
    if (error instanceof OpenAI.APIConnectionTimeoutError) {
      return new ModelCallError("Model request timed out", {
        status: 504,
        retryable: true,
        hints: ["Try running again in a few minutes"],
        cause: error,
      });
    }
    if (error instanceof OpenAI.AuthenticationError) {
      return new ModelCallError(`Model authentication failed: ${error.message}`, {
        hints: ["Verify your OpenAI API key is correct"],
        cause: error,
      });
    }
    if (error instanceof OpenAI.RateLimitError) {
      return new ModelCallError(`Model rate limit or quota exceeded: ${error.message}`, {
        hints: ["Ensure you have sufficient API credits", "Try running again in a few minutes"],
        cause: error,
      });
    }
    if (error instanceof OpenAI.APIConnectionError) {
      return new ModelCallError(`Could not reach the model API: ${error.message}`, {
        hints: ["Check your internet connection"],
        cause: error,
      });
    }
    logger.error(`Model request failed: ${errorMessage(error)}`);
    return new ModelCallError(`Model request failed: ${errorMessage(error)}`, {
      hints: TROUBLESHOOTING_HINTS,
      cause: error,
    });
  }
}

export const planGeneratorService = new PlanGeneratorService();
