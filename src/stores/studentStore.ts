import { DynamoDBDocumentClient, GetCommand, UpdateCommand } from "@aws-sdk/lib-dynamodb";
import { isConditionalCheckFailed } from "./dynamo";

/**
 * Student record in the Investor table, keyed by email.
 * `subject_list` holds the lesson UUIDs the student is linked to.
 */
export interface StudentRecord {
  email: string;
  subject_list: string[];
}

/**
 * StudentStore handles student subject lists.
 * Lookups are exact-key; case folding is up to the caller.
 */
export interface StudentStore {
  findByEmail(email: string): Promise<StudentRecord | null>;

  /**
   * Append `lessonUUID` to the student's subject list unless it is already
   * there. Returns false when the list already contained it at write time.
   */
  appendSubject(email: string, lessonUUID: string): Promise<boolean>;
}

export class DynamoStudentStore implements StudentStore {
  constructor(private client: DynamoDBDocumentClient, private tableName: string) {}

  async findByEmail(email: string): Promise<StudentRecord | null> {
    const result = await this.client.send(
      new GetCommand({ TableName: this.tableName, Key: { email } })
    );
    const item = result.Item;
    if (!item || typeof item.email !== "string") {
      return null;
    }
    const subjectList: unknown = item.subject_list;
    return {
      email: item.email,
      subject_list: Array.isArray(subjectList)
        ? subjectList.filter((entry): entry is string => typeof entry === "string")
        : [],
    };
  }

  async appendSubject(email: string, lessonUUID: string): Promise<boolean> {
    try {
      await this.client.send(
        new UpdateCommand({
          TableName: this.tableName,
          Key: { email },
          UpdateExpression: "SET subject_list = list_append(if_not_exists(subject_list, :empty), :uuid)",
          ConditionExpression:
            "attribute_exists(email) AND (attribute_not_exists(subject_list) OR NOT contains(subject_list, :value))",
          ExpressionAttributeValues: {
            ":empty": [],
            ":uuid": [lessonUUID],
            ":value": lessonUUID,
          },
        })
      );
      return true;
    } catch (error) {
      if (isConditionalCheckFailed(error)) {
        return false;
      }
      throw error;
    }
  }
}
