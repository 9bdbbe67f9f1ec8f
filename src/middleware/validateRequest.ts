import type { NextFunction, Request, Response } from "express";
import { ZodError, type ZodTypeAny } from "zod";
import { formatIssues } from "../utils/validation";

type RequestSchema = {
  body?: ZodTypeAny;
};

export function validateRequest(schema: RequestSchema) {
  return (req: Request, res: Response, next: NextFunction) => {
    try {
      if (schema.body) {
        req.body = schema.body.parse(req.body ?? {});
      }
      return next();
    } catch (error) {
      if (error instanceof ZodError) {
        return res.status(400).json({
          message: "Validation failed.",
          errors: formatIssues(error)
        });
      }
      return next(error);
    }
  };
}
