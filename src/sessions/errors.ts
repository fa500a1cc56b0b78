import { AppError, type ErrorDetails } from "../api/types.js";

/** The OS refused to start the process: executable not found, permission denied, bad working directory. */
export class SpawnError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super(500, "SPAWN_FAILED", message, true, details);
    this.name = "SpawnError";
  }
}

/** The process started but its output pipes could not be acquired. */
export class CaptureUnavailableError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super(500, "CAPTURE_UNAVAILABLE", message, true, details);
    this.name = "CaptureUnavailableError";
  }
}
