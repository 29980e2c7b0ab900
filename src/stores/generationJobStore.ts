import { DynamoDBDocumentClient, GetCommand } from "@aws-sdk/lib-dynamodb";
import { GenerationJobRecord, JobScope } from "../domain/generationJob";

/**
 * Read-only access to test series job records.
 * Predefined jobs are keyed by id; user jobs by (email, id).
 */
export interface GenerationJobStore {
  get(jobId: string, scope: JobScope): Promise<GenerationJobRecord | null>;
}

export interface DynamoGenerationJobStoreOptions {
  predefinedTable: string;
  userTable: string;
}

export class DynamoGenerationJobStore implements GenerationJobStore {
  constructor(
    private client: DynamoDBDocumentClient,
    private options: DynamoGenerationJobStoreOptions
  ) {}

  async get(jobId: string, scope: JobScope): Promise<GenerationJobRecord | null> {
    const command = scope.predefined
      ? new GetCommand({ TableName: this.options.predefinedTable, Key: { id: jobId } })
      : new GetCommand({
          TableName: this.options.userTable,
          Key: { email: scope.userEmail, id: jobId },
        });

    const result = await this.client.send(command);
    const item = result.Item;
    if (!item) {
      return null;
    }
    return {
      id: jobId,
      Generated: item.Generated,
      series_title: typeof item.series_title === "string" ? item.series_title : undefined,
      email: typeof item.email === "string" ? item.email : undefined,
    };
  }
}
