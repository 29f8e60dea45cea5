import { Request, Response, NextFunction } from "express";
import { ZodError } from "zod";
import { HttpError } from "../utils/errors";
import { describeError, logger } from "../utils/logger";

// body-parser marks unparseable JSON bodies with this type.
const isBodyParseError = (error: unknown): boolean =>
  error instanceof SyntaxError && "type" in error && error.type === "entity.parse.failed";

const errorHandler = (
  error: unknown,
  req: Request,
  res: Response,
  next: NextFunction
): void => {
  if (res.headersSent) {
    next(error);
    return;
  }

  if (error instanceof ZodError) {
    const [issue] = error.issues;
    const field = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    res.status(400).json({
      success: false,
      error: issue ? `${field}${issue.message}` : "Invalid request",
    });
    return;
  }

  if (error instanceof HttpError) {
    res.status(error.statusCode).json({
      success: false,
      error: error.message,
      ...(error.details ? { details: error.details } : {}),
    });
    return;
  }

  if (isBodyParseError(error)) {
    res.status(400).json({ success: false, error: "Invalid JSON body" });
    return;
  }

  logger.error("http.unhandled_error", {
    method: req.method,
    path: req.originalUrl,
    ...describeError(error),
  });
  res.status(500).json({ success: false, error: "An unexpected error occurred" });
};

export default errorHandler;
