import { Response } from "express";
import { CoachError } from "./errors";

type SuccessPayload<T> = {
  success: true;
  message: string;
  data?: T;
};

type ErrorPayload = {
  success: false;
  message: string;
  error?: string;
  hints?: string[];
};

export const sendSuccess = <T>(
  res: Response,
  message: string,
  data?: T,
  status = 200
) => {
  const payload: SuccessPayload<T> = { success: true, message, data };
  return res.status(status).json(payload);
};

export const sendError = (
  res: Response,
  message: string,
  status = 400,
  error?: string,
  hints?: string[]
) => {
  const payload: ErrorPayload = { success: false, message, error, hints };
  return res.status(status).json(payload);
};

// `message` says what failed, the error's own text goes under `error`
export const sendCoachError = (res: Response, message: string, error: CoachError) =>
  sendError(
    res,
    message,
    error.status,
    error.message,
    error.hints.length > 0 ? error.hints : undefined
  );

export const sendHtml = (res: Response, html: string, status = 200) =>
  res.status(status).type("html").send(html);
