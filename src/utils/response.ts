import { Response } from "express";
import { loadConfig } from "../configs/environment";

export type ApiResponse<T> =
  | { success: true; message: string; data?: T }
  | { success: false; message: string; error?: string };

export const sendSuccess = <T>(res: Response, message: string, data?: T, status = 200) => {
  const body: ApiResponse<T> = { success: true, message, data };
  return res.status(status).json(body);
};

export const sendError = (res: Response, message: string, status = 400, error?: string) => {
  const body: ApiResponse<never> = { success: false, message, error };
  return res.status(status).json(body);
};

/** Error detail is only echoed back outside production. */
export const exposeError = (error: unknown): string | undefined => {
  if (loadConfig().nodeEnv === "production") return undefined;
  return error instanceof Error ? error.message : String(error);
};
