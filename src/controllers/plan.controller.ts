import { Request, Response } from "express";
import { trainingPlanService, TrainingPlanService } from "../services/trainingPlan.service";
import { planStoreService, PlanStoreService } from "../services/planStore.service";
import { planRendererService, PlanRendererService } from "../services/planRenderer.service";
import { GeneratePlanBody } from "../validators/plan-request.validator";
import { logger } from "../utils/logger";
import { CoachError, PlanNotFoundError, errorMessage } from "../utils/errors";
import { sendCoachError, sendError, sendHtml, sendSuccess } from "../utils/response";

class PlanController {
  constructor(
    private readonly trainingPlans: TrainingPlanService = trainingPlanService,
    private readonly store: PlanStoreService = planStoreService,
    private readonly renderer: PlanRendererService = planRendererService
  ) {}

  private sendFailure(res: Response, message: string, error: unknown) {
    if (error instanceof CoachError) {
      return sendCoachError(res, message, error);
    }
    return sendError(res, message, 500, errorMessage(error));
  }

  private sendNotFound(res: Response, planId: number) {
    const error = new PlanNotFoundError(planId);
    return sendError(res, error.message, error.status);
  }

  generatePlan = async (req: Request, res: Response) => {
    try {
      const body: GeneratePlanBody = req.body;
      const result = await this.trainingPlans.generate({
        query: body.query,
        image: body.image
          ? { base64: body.image.data, mimeType: body.image.mimeType }
          : null,
      });

      sendSuccess(
        res,
        "Plan generated",
        {
          planId: result.planId,
          plan: result.plan,
          expectedWeeks: result.expectedWeeks,
          warnings: result.warnings,
          persistenceError: result.persistenceError,
        },
        201
      );
    } catch (error) {
      logger.error(`generate plan error: ${errorMessage(error)}`);
      this.sendFailure(res, "Failed to generate plan", error);
    }
  };

  listPlans = async (_req: Request, res: Response) => {
    try {
      sendSuccess(res, "Plans retrieved", this.store.list());
    } catch (error) {
      logger.error(`list plans error: ${errorMessage(error)}`);
      this.sendFailure(res, "Failed to list plans", error);
    }
  };

  getPlan = async (req: Request, res: Response) => {
    const planId = Number(req.params.id);
    try {
      const plan = this.store.load(planId);
      if (!plan) {
        return this.sendNotFound(res, planId);
      }
      sendSuccess(res, "Plan retrieved", plan);
    } catch (error) {
      logger.error(`get plan error: ${errorMessage(error)}`);
      this.sendFailure(res, "Failed to retrieve plan", error);
    }
  };

  getPlanHtml = async (req: Request, res: Response) => {
    const planId = Number(req.params.id);
    try {
      const plan = this.store.load(planId);
      if (!plan) {
        return this.sendNotFound(res, planId);
      }
      sendHtml(res, this.renderer.renderHtml(plan, { stylesheetHref: "/assets/style.css" }));
    } catch (error) {
      logger.error(`render plan error: ${errorMessage(error)}`);
      this.sendFailure(res, "Failed to render plan", error);
    }
  };

  deletePlan = async (req: Request, res: Response) => {
    const planId = Number(req.params.id);
    try {
      if (!this.store.delete(planId)) {
        return this.sendNotFound(res, planId);
      }
      sendSuccess(res, "Plan deleted", { planId });
    } catch (error) {
      logger.error(`delete plan error: ${errorMessage(error)}`);
      this.sendFailure(res, "Failed to delete plan", error);
    }
  };
}

export { PlanController };

// Export class instance (Singleton)
export default new PlanController();
