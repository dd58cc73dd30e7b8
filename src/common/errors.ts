/**
 * APP ERRORS
 *
 * Typed error taxonomy. The global Fastify error handler maps every AppError
 * to `{ ok: false, error: code, message }` with its status code.
 */

export class AppError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly statusCode: number = 500
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Missing credential or invalid environment. Fatal for the run, raised before
 * any network call.
 */
export class ConfigError extends AppError {
  constructor(message: string) {
    super('CONFIG_ERROR', message, 503);
  }
}

/**
 * Country metadata or FX service failed (non-success status, unreachable,
 * malformed payload).
 */
export class UpstreamError extends AppError {
  constructor(
    public readonly service: string,
    message: string,
    public readonly upstreamStatus?: number
  ) {
    super('UPSTREAM_ERROR', `[${service}] ${message}`, 502);
  }
}

export class PanelSchemaError extends AppError {
  constructor(message: string) {
    super('PANEL_SCHEMA_ERROR', message, 500);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
