import express from "express";
import planController from "../../controllers/plan.controller";
import { validateRequest } from "../../middlewares/schema-validation.middleware";
import {
  generatePlanSchema,
  planIdParamsSchema,
} from "../../validators/plan-request.validator";

const router = express.Router();

router.get("/", planController.listPlans);
router.post(
  "/generate",
  validateRequest(generatePlanSchema),
  planController.generatePlan
);
router.get("/:id", validateRequest(planIdParamsSchema), planController.getPlan);
router.get(
  "/:id/html",
  validateRequest(planIdParamsSchema),
  planController.getPlanHtml
);
router.delete(
  "/:id",
  validateRequest(planIdParamsSchema),
  planController.deletePlan
);

export default router;
