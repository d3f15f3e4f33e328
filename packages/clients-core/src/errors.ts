/**
 * Non-2xx response from an API endpoint.
 *
 * The raw body is kept because the OSM API explains most rejections
 * (e.g. "The maximum bbox size is 0.25") in plain text.
 */
export class ApiError extends Error {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly body: string;

  constructor(method: string, path: string, status: number, body: string) {
    super(`${method} ${path} failed: ${status} ${body.trim()}`);
    this.name = "ApiError";
    this.method = method;
    this.path = path;
    this.status = status;
    this.body = body;
  }
}
