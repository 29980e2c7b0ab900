import { Request, Response } from "express";
import { z } from "zod";

/**
 * Parse a request body, answering 400 with the issues when it does not
 * match. Returns null when a response has been sent.
 */
export function parseBody<T extends z.ZodTypeAny>(
  schema: T,
  req: Request,
  res: Response
): z.infer<T> | null {
  const result = schema.safeParse(req.body ?? {});
  if (!result.success) {
    res.status(400).json({
      status: "error",
      error: "Invalid request body",
      issues: result.error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      })),
    });
    return null;
  }
  return result.data;
}
