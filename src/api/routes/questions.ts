import { Router } from "express";
import { QuestionGenerator } from "../../domain/questionGenerator";
import {
  generateQuestionRequestSchema,
  regenerateQuestionRequestSchema,
} from "../../domain/quizQuestion";
import { parseBody } from "../validation";

export function createQuestionsRouter(questions: QuestionGenerator): Router {
  const router = Router();

  // POST /api/ai/generate-question - Write one multiple-choice question
  router.post("/generate-question", async (req, res) => {
    const request = parseBody(generateQuestionRequestSchema, req, res);
    if (!request) return;

    const result = await questions.generate(request);
    res.status(result.success ? 200 : 500).json(result);
  });

  // POST /api/ai/regenerate-question - Rewrite a question from an edit instruction
  router.post("/regenerate-question", async (req, res) => {
    const request = parseBody(regenerateQuestionRequestSchema, req, res);
    if (!request) return;

    const result = await questions.regenerate(request);
    res.status(result.success ? 200 : 500).json(result);
  });

  return router;
}
