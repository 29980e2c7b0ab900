/**
 * Non-2xx response from an HTTP collaborator (school gateway or generator).
 */
export class GatewayError extends Error {
  readonly statusCode: number;
  readonly body: string;

  constructor(message: string, options: { statusCode: number; body: string }) {
    super(message);
    this.name = "GatewayError";
    this.statusCode = options.statusCode;
    this.body = options.body;
  }
}
