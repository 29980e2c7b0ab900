import { InvokeCommand, LambdaClient } from "@aws-sdk/client-lambda";
import { z } from "zod";

/**
 * Synchronous serverless invocation returning a `{ statusCode, body }`
 * envelope.
 */
export interface ModuleInvoker {
  invoke(payload: unknown): Promise<InvocationResult>;
}

export interface InvocationResult {
  statusCode: number;
  body: unknown;
}

const invocationResultSchema = z.object({
  statusCode: z.number().int(),
  body: z.unknown(),
});

export interface LambdaModuleInvokerOptions {
  client: LambdaClient;
  functionName: string;
  alias: string;
}

export class LambdaModuleInvoker implements ModuleInvoker {
  private client: LambdaClient;
  private functionName: string;
  private alias: string;

  constructor(options: LambdaModuleInvokerOptions) {
    this.client = options.client;
    this.functionName = options.functionName;
    this.alias = options.alias;
  }

  async invoke(payload: unknown): Promise<InvocationResult> {
    const response = await this.client.send(
      new InvokeCommand({
        FunctionName: this.functionName,
        Qualifier: this.alias,
        InvocationType: "RequestResponse",
        Payload: new TextEncoder().encode(JSON.stringify(payload)),
      })
    );

    const text = response.Payload ? new TextDecoder().decode(response.Payload) : "";
    if (response.FunctionError) {
      throw new Error(`${this.functionName} failed (${response.FunctionError}): ${text}`);
    }

    const parsed = invocationResultSchema.safeParse(text ? JSON.parse(text) : null);
    if (!parsed.success) {
      throw new Error(`${this.functionName} returned an unrecognized payload: ${text}`);
    }
    return { statusCode: parsed.data.statusCode, body: parsed.data.body };
  }
}
