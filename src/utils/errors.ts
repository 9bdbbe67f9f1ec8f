import { HttpError } from "../middleware/httpError";

/** Invalid configuration; fatal for the whole run. */
export class ConfigError extends HttpError {
  constructor(message: string, details?: unknown) {
    super(422, message, details, "CONFIG_ERROR");
  }
}

/** Bad data on a single work item; the item is skipped and the batch continues. */
export class InputError extends HttpError {
  workItemId?: string;

  constructor(message: string, workItemId?: string, details?: unknown) {
    super(400, message, details, "INPUT_ERROR");
    this.workItemId = workItemId;
  }
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: ConfigError | InputError };

export function captureResult<T>(fn: () => T): Result<T> {
  try {
    return { ok: true, value: fn() };
  } catch (error) {
    if (error instanceof ConfigError || error instanceof InputError) {
      return { ok: false, error };
    }
    throw error;
  }
}
