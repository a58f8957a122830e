/*
|--------------------------------------------------------------------------
| Error taxonomy
|--------------------------------------------------------------------------
| Everything the pipeline throws on purpose extends CanopyWatchError so the
| CLI can tell operator-facing failures apart from bugs.
|--------------------------------------------------------------------------
*/

export class CanopyWatchError extends Error {
  code: string;
  details?: unknown;

  constructor(message: string, code = "CANOPY_WATCH_ERROR", details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

/* ---------------- Fail before any external call ---------------- */

export class ConfigurationError extends CanopyWatchError {
  constructor(message: string, details?: unknown) {
    super(message, "CONFIGURATION_ERROR", details);
  }
}

export class ParseError extends ConfigurationError {
  constructor(message: string, details?: unknown) {
    super(message, details);
    this.code = "PARSE_ERROR";
  }
}

/* ---------------- Collaborators ---------------- */

export class SetupError extends CanopyWatchError {
  constructor(message: string, details?: unknown) {
    super(message, "SETUP_ERROR", details);
  }
}

export class ServiceError extends CanopyWatchError {
  status?: number;

  constructor(message: string, status?: number, details?: unknown) {
    super(message, "SERVICE_ERROR", details);
    this.status = status;
  }
}

/* ---------------- Data ---------------- */

export class BoundaryError extends CanopyWatchError {
  constructor(message: string, details?: unknown) {
    super(message, "BOUNDARY_ERROR", details);
  }
}

export class RasterMismatchError extends CanopyWatchError {
  constructor(message: string, details?: unknown) {
    super(message, "RASTER_MISMATCH", details);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof CanopyWatchError) {
    return `${error.code}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
