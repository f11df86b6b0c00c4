import path from "path";
import { logger } from "../utils/logger";
import { AppConfig, loadConfig } from "../configs/environment";
import { RunningPlan } from "../types/model/runningPlan.model";
import { validateUserInput } from "../validators/plan-request.validator";
import { validatePlanStructure } from "../validators/running-plan.validator";
import { ImageError, PlanStructureError, errorMessage } from "../utils/errors";
import { buildPlanRequest } from "./planRequest.service";
import { PlanGeneratorService, planGeneratorService } from "./planGenerator.service";
import { PlanStoreService, planStoreService } from "./planStore.service";
import {
  ImagePreparationService,
  PreparedImage,
  imagePreparationService,
} from "./imagePreparation.service";
import {
  OutputFileResult,
  OutputPaths,
  PlanRendererService,
  planRendererService,
} from "./planRenderer.service";

export interface InlineImage {
  base64: string;
  mimeType: string;
}

export interface GeneratePlanInput {
  query: string;
  imagePath?: string | null;
  image?: InlineImage | null;
  outputPaths?: OutputPaths | null;
}

export interface GeneratePlanResult {
  plan: RunningPlan;
  model: string;
  usedImage: boolean;
  expectedWeeks: number | null;
  planId: number | null;
  persistenceError: string | null;
  outputs: OutputFileResult[];
  warnings: string[];
}

export const defaultOutputPaths = (config: AppConfig = loadConfig()): OutputPaths => ({
  html: path.join(config.output.dir, config.output.htmlFile),
  json: path.join(config.output.dir, config.output.jsonFile),
  css: path.join(config.output.dir, config.output.cssFile),
});

/**
 * Runs one goal through the pipeline: image, request, model, validation,
 * then persistence and rendering as two independent steps.
 */
export class TrainingPlanService {
  constructor(
    private readonly generator: PlanGeneratorService = planGeneratorService,
    private readonly store: PlanStoreService = planStoreService,
    private readonly renderer: PlanRendererService = planRendererService,
    private readonly images: ImagePreparationService = imagePreparationService
  ) {}

  private async resolveImage(
    input: GeneratePlanInput,
    warnings: string[]
  ): Promise<InlineImage | null> {
    const { image, imagePath } = input;

    try {
      let prepared: PreparedImage;
      if (image) {
        prepared = await this.images.prepareEncodedImage(image.base64);
      } else if (imagePath) {
        prepared = await this.images.prepareImage(imagePath);
      } else {
        return null;
      }
      return { base64: prepared.base64, mimeType: prepared.mimeType };
    } catch (error) {
      if (!(error instanceof ImageError)) throw error;
      logger.warn(`${error.message}. Proceeding without image`);
      warnings.push(`${error.message}. Proceeding without image (results may be less personalized)`);
      return null;
    }
  }

  private persist(plan: RunningPlan): { planId: number | null; error: string | null } {
    if (!this.store.initSchema()) {
      return { planId: null, error: "Database schema could not be created" };
    }
    try {
      return { planId: this.store.save(plan), error: null };
    } catch (error) {
      logger.error(`Database save failed: ${errorMessage(error)}`);
      return { planId: null, error: errorMessage(error) };
    }
  }

  async generate(input: GeneratePlanInput): Promise<GeneratePlanResult> {
    const query = validateUserInput(input.query);
    const warnings: string[] = [];

    const image = await this.resolveImage(input, warnings);
    const request = buildPlanRequest(query, image?.base64, { mimeType: image?.mimeType });

    const plan = await this.generator.generatePlan(request);
    if (!validatePlanStructure(plan)) {
      throw new PlanStructureError("Generated plan failed structure validation");
    }

    if (request.expectedWeeks !== null && plan.plan.length !== request.expectedWeeks) {
      const warning = `Expected ${request.expectedWeeks} week(s) but the plan has ${plan.plan.length}`;
      logger.warn(warning);
      warnings.push(warning);
    }

    const persisted = this.persist(plan);
    const outputs = input.outputPaths
      ? await this.renderer.writeOutputs(plan, input.outputPaths)
      : [];

    return {
      plan,
      model: request.model,
      usedImage: image !== null,
      expectedWeeks: request.expectedWeeks,
      planId: persisted.planId,
      persistenceError: persisted.error,
      outputs,
      warnings,
    };
  }
}

export const trainingPlanService = new TrainingPlanService();
