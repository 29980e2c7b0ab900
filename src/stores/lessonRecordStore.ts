import { DynamoDBDocumentClient, GetCommand, PutCommand } from "@aws-sdk/lib-dynamodb";
import { LessonRecord } from "../domain/lessonRecord";

/**
 * LessonRecordStore handles the Grade_and_Subject table.
 */
export interface LessonRecordStore {
  save(record: LessonRecord): Promise<void>;
  /**
   * Owning tenant email of a lesson/subject record, or null when the
   * record does not exist.
   */
  getTenantEmail(id: string): Promise<string | null>;
}

export class DynamoLessonRecordStore implements LessonRecordStore {
  constructor(private client: DynamoDBDocumentClient, private tableName: string) {}

  async save(record: LessonRecord): Promise<void> {
    await this.client.send(new PutCommand({ TableName: this.tableName, Item: record }));
  }

  async getTenantEmail(id: string): Promise<string | null> {
    const result = await this.client.send(
      new GetCommand({ TableName: this.tableName, Key: { id } })
    );
    const email = result.Item?.tenantEmail;
    return typeof email === "string" && email.length > 0 ? email : null;
  }
}
