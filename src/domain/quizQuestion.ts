import { z } from "zod";

/**
 * Multiple-choice quiz question. Field names match the question bank
 * tables: four options, each with an explanation, and a 1-based
 * CorrectAnswer.
 */
export const quizQuestionSchema = z.object({
  Question: z.string().min(1),
  options__001: z.string(),
  description__001: z.string(),
  options__002: z.string(),
  description__002: z.string(),
  options__003: z.string(),
  description__003: z.string(),
  options__004: z.string(),
  description__004: z.string(),
  CorrectAnswer: z.coerce.number().int().min(1).max(4),
});

export type QuizQuestion = z.infer<typeof quizQuestionSchema>;

export const quizResponseSchema = z.object({
  questions: z.array(quizQuestionSchema).min(1),
});

const difficulty = z.enum(["easy", "medium", "hard"]);

export const generateQuestionRequestSchema = z.object({
  subject: z.string().min(1),
  topic: z.string().min(1),
  subtopic: z.string().optional(),
  grade_level: z.string().min(1),
  difficulty,
  learning_style: z.string().optional(),
  additional_context: z.string().optional(),
});

export type GenerateQuestionRequest = z.infer<typeof generateQuestionRequestSchema>;

export const regenerateQuestionRequestSchema = z.object({
  current_question: z.record(z.unknown()),
  edit_instruction: z.string().min(1),
  subject: z.string().min(1),
  topic: z.string().min(1),
  grade_level: z.string().min(1),
  difficulty,
});

export type RegenerateQuestionRequest = z.infer<typeof regenerateQuestionRequestSchema>;

export type GenerateQuestionResult =
  | { success: true; question: QuizQuestion }
  | { success: false; error_message: string };

export type RegenerateQuestionResult =
  | { success: true; regenerated_question: QuizQuestion; changes_summary: string[] }
  | { success: false; error_message: string };

/**
 * Summarize what a regeneration changed.
 */
export function detectChanges(current: Record<string, unknown>, next: QuizQuestion): string[] {
  const changes: string[] = [];
  if (current.Question !== next.Question) {
    changes.push("Question text updated");
  }
  if (current.CorrectAnswer !== undefined && Number(current.CorrectAnswer) !== next.CorrectAnswer) {
    changes.push(`Correct answer moved to option ${next.CorrectAnswer}`);
  }
  changes.push("All options and explanations regenerated");
  return changes;
}
