import { NextFunction, Request, Response } from "express";
import { errorMiddleware } from "./error.middleware";
import { InputValidationError, ModelCallError } from "../utils/errors";

const mockResponse = () => {
  const res = { status: jest.fn(), json: jest.fn() };
  res.status.mockReturnValue(res);
  res.json.mockReturnValue(res);
  return res;
};

const handle = (err: unknown) => {
  const res = mockResponse();
  const req = { method: "POST", originalUrl: "/api/v1/plans/generate" } as Request;
  errorMiddleware(err, req, res as unknown as Response, jest.fn() as NextFunction);
  return res;
};

describe("errorMiddleware", () => {
  it("answers an input error with 400 and its kind", () => {
    const res = handle(new InputValidationError("Please enter a running goal"));

    expect(res.status).toHaveBeenCalledWith(400);
    expect(res.json).toHaveBeenCalledWith({
      success: false,
      message: "Please enter a running goal",
      error: "input_validation",
      hints: undefined,
    });
  });

  it("passes the hints of a failed model call along", () => {
    const res = handle(
      new ModelCallError("Model request timed out", {
        status: 504,
        hints: ["Try running again in a few minutes"],
      })
    );

    expect(res.status).toHaveBeenCalledWith(504);
    expect(res.json).toHaveBeenCalledWith({
      success: false,
      message: "Model request timed out",
      error: "external_call",
      hints: ["Try running again in a few minutes"],
    });
  });

  it("answers anything else with 500", () => {
    const res = handle(new Error("boom"));

    expect(res.status).toHaveBeenCalledWith(500);
    expect(res.json).toHaveBeenCalledWith({
      success: false,
      message: "boom",
      error: undefined,
      hints: undefined,
    });
  });
});
