import { DynamoDBDocumentClient, GetCommand, PutCommand } from "@aws-sdk/lib-dynamodb";
import { CoursePlanRecord, dedupKey } from "../domain/coursePlan";

/**
 * CoursePlanStore handles the ICP table, keyed by (email, topic_id).
 * Emails are lowercased before every read and write.
 */
export interface CoursePlanStore {
  exists(ownerEmail: string, topicId: string): Promise<boolean>;
  save(record: CoursePlanRecord): Promise<void>;
}

export class DynamoCoursePlanStore implements CoursePlanStore {
  constructor(private client: DynamoDBDocumentClient, private tableName: string) {}

  async exists(ownerEmail: string, topicId: string): Promise<boolean> {
    const result = await this.client.send(
      new GetCommand({
        TableName: this.tableName,
        Key: dedupKey(ownerEmail, topicId),
        ProjectionExpression: "email",
      })
    );
    return result.Item !== undefined;
  }

  async save(record: CoursePlanRecord): Promise<void> {
    await this.client.send(
      new PutCommand({
        TableName: this.tableName,
        Item: { ...record, ...dedupKey(record.email, record.topic_id) },
      })
    );
  }
}
