import fs from "fs";
import os from "os";
import path from "path";
import { Request, Response } from "express";
import { PlanController } from "./plan.controller";
import { TrainingPlanService } from "../services/trainingPlan.service";
import { PlanGeneratorService } from "../services/planGenerator.service";
import { PlanStoreService } from "../services/planStore.service";
import { PlanRendererService } from "../services/planRenderer.service";
import { ImagePreparationService } from "../services/imagePreparation.service";
import { buildPlan } from "../__fixtures__/runningPlan.fixture";
import { chatCompletion, mockCreate } from "../__fixtures__/chatCompletion.fixture";

const mockResponse = () => {
  const res = {
    status: jest.fn(),
    json: jest.fn(),
    type: jest.fn(),
    send: jest.fn(),
  };
  res.status.mockReturnValue(res);
  res.json.mockReturnValue(res);
  res.type.mockReturnValue(res);
  res.send.mockReturnValue(res);
  return res;
};

const asRequest = (value: Partial<Request>) => value as Request;
const asResponse = (value: ReturnType<typeof mockResponse>) => value as unknown as Response;

describe("PlanController", () => {
  let dir: string;
  let store: PlanStoreService;
  let create: ReturnType<typeof mockCreate>;
  let controller: PlanController;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "coach-controller-"));
    store = new PlanStoreService(path.join(dir, "plans.sqlite"));
    store.initSchema();
    create = mockCreate();
    const renderer = new PlanRendererService();
    controller = new PlanController(
      new TrainingPlanService(
        new PlanGeneratorService({ create }),
        store,
        renderer,
        new ImagePreparationService()
      ),
      store,
      renderer
    );
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe("generatePlan", () => {
    it("responds 201 with the saved plan", async () => {
      const plan = buildPlan(3);
      create.mockResolvedValue(chatCompletion(JSON.stringify(plan)));
      const res = mockResponse();

      await controller.generatePlan(
        asRequest({ body: { query: "run a 10k in 3 weeks" } }),
        asResponse(res)
      );

      expect(res.status).toHaveBeenCalledWith(201);
      expect(res.json).toHaveBeenCalledWith({
        success: true,
        message: "Plan generated",
        data: {
          planId: 1,
          plan,
          expectedWeeks: 3,
          warnings: [],
          persistenceError: null,
        },
      });
    });

    it("responds 422 when the model answer has the wrong shape", async () => {
      create.mockResolvedValue(chatCompletion(JSON.stringify({ motivation: "Go" })));
      const res = mockResponse();

      await controller.generatePlan(
        asRequest({ body: { query: "run a 10k in 3 weeks" } }),
        asResponse(res)
      );

      expect(res.status).toHaveBeenCalledWith(422);
      expect(res.json.mock.calls[0][0]).toMatchObject({
        success: false,
        message: "Failed to generate plan",
      });
    });

    it("responds 502 with hints when the model call fails", async () => {
      create.mockRejectedValue(new Error("socket hang up"));
      const res = mockResponse();

      await controller.generatePlan(
        asRequest({ body: { query: "run a 10k in 3 weeks" } }),
        asResponse(res)
      );

      expect(res.status).toHaveBeenCalledWith(502);
      expect(res.json.mock.calls[0][0]).toMatchObject({
        success: false,
        message: "Failed to generate plan",
        error: "Model request failed: socket hang up",
        hints: expect.arrayContaining(["Check your internet connection"]),
      });
    });
  });

  describe("listPlans", () => {
    it("returns the stored summaries", async () => {
      store.save({ ...buildPlan(1), motivation: "Short and sweet" });
      const res = mockResponse();

      await controller.listPlans(asRequest({}), asResponse(res));

      expect(res.status).toHaveBeenCalledWith(200);
      expect(res.json.mock.calls[0][0]).toMatchObject({
        success: true,
        data: [{ id: 1, motivation: "Short and sweet" }],
      });
    });
  });

  describe("getPlan", () => {
    it("returns the full plan", async () => {
      const plan = buildPlan(2);
      const planId = store.save(plan);
      const res = mockResponse();

      await controller.getPlan(asRequest({ params: { id: String(planId) } }), asResponse(res));

      expect(res.json).toHaveBeenCalledWith({
        success: true,
        message: "Plan retrieved",
        data: plan,
      });
    });

    it("responds 404 for an unknown id", async () => {
      const res = mockResponse();

      await controller.getPlan(asRequest({ params: { id: "7" } }), asResponse(res));

      expect(res.status).toHaveBeenCalledWith(404);
      expect(res.json.mock.calls[0][0]).toMatchObject({
        success: false,
        message: "Plan with ID 7 not found",
      });
    });
  });

  describe("getPlanHtml", () => {
    it("sends the rendered page linked to the served stylesheet", async () => {
      const plan = buildPlan(1);
      const planId = store.save(plan);
      const res = mockResponse();

      await controller.getPlanHtml(asRequest({ params: { id: String(planId) } }), asResponse(res));

      expect(res.type).toHaveBeenCalledWith("html");
      expect(res.send).toHaveBeenCalledWith(
        new PlanRendererService().renderHtml(plan, { stylesheetHref: "/assets/style.css" })
      );
    });
  });

  describe("deletePlan", () => {
    it("removes the plan and then reports it missing", async () => {
      const planId = store.save(buildPlan(1));
      const first = mockResponse();
      const second = mockResponse();

      await controller.deletePlan(asRequest({ params: { id: String(planId) } }), asResponse(first));
      await controller.deletePlan(asRequest({ params: { id: String(planId) } }), asResponse(second));

      expect(first.json).toHaveBeenCalledWith({
        success: true,
        message: "Plan deleted",
        data: { planId },
      });
      expect(second.status).toHaveBeenCalledWith(404);
      expect(store.load(planId)).toBeNull();
    });
  });
});
