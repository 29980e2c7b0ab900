/**
 * Student Subject Linker
 *
 * Adds a lesson UUID to a student's subject list at most once.
 *
 * - Student keys are emails. A lookup that misses is retried once with the
 *   lowercased email, since callers do not always match the stored casing.
 * - Writes go to the stored key, never to the caller's spelling.
 * - The write is a conditional append, so two linkers racing on the same
 *   student cannot drop each other's update.
 */

import { StudentLinkSummary } from "../domain/provisioning";
import { errorMessage } from "../domain/errors";
import { StudentStore, StudentRecord } from "../stores/studentStore";

export type LinkResult =
  | { status: "linked"; added: boolean; ownerKeyUsed: string }
  | { status: "not_found"; ownerKey: string };

export class StudentSubjectLinker {
  constructor(private studentStore: StudentStore) {}

  async link(ownerKey: string, lessonUUID: string): Promise<LinkResult> {
    const student = await this.findStudent(ownerKey);
    if (!student) {
      console.log(`[link] Student ${ownerKey} not found (including lowercase retry)`);
      return { status: "not_found", ownerKey };
    }

    if (student.subject_list.includes(lessonUUID)) {
      return { status: "linked", added: false, ownerKeyUsed: student.email };
    }

    const added = await this.studentStore.appendSubject(student.email, lessonUUID);
    if (added) {
      console.log(`[link] Added ${lessonUUID} to ${student.email}'s subject_list`);
    }
    return { status: "linked", added, ownerKeyUsed: student.email };
  }

  /**
   * Link one lesson to many students. One student's failure never stops
   * the others.
   */
  async linkMany(lessonUUID: string, emails: string[]): Promise<StudentLinkSummary> {
    const summary: StudentLinkSummary = {
      lessonUUID,
      updated: [],
      alreadyLinked: [],
      notFound: [],
      failed: [],
    };

    for (const email of emails) {
      try {
        const result = await this.link(email, lessonUUID);
        if (result.status === "not_found") {
          summary.notFound.push(email);
        } else if (result.added) {
          summary.updated.push(result.ownerKeyUsed);
        } else {
          summary.alreadyLinked.push(result.ownerKeyUsed);
        }
      } catch (error) {
        console.error(`[link] Error updating student ${email}:`, errorMessage(error));
        summary.failed.push(email);
      }
    }

    return summary;
  }

  private async findStudent(email: string): Promise<StudentRecord | null> {
    const exact = await this.studentStore.findByEmail(email);
    if (exact) {
      return exact;
    }
    const lowered = email.toLowerCase();
    if (lowered === email) {
      return null;
    }
    return this.studentStore.findByEmail(lowered);
  }
}
