import OpenAI from "openai";
import {
  GenerateQuestionRequest,
  GenerateQuestionResult,
  QuizQuestion,
  RegenerateQuestionRequest,
  RegenerateQuestionResult,
  detectChanges,
  quizResponseSchema,
} from "./quizQuestion";
import { errorMessage } from "./errors";

const SYSTEM_PROMPT = `You are an expert educator creating high-quality quiz questions.

Requirements:
1. Educationally valuable, not rote
2. Clear, age-appropriate language
3. Use LaTeX for math/science
4. Explanations: 2-3 sentences
5. Exactly one correct option

You MUST respond with valid JSON matching this exact structure:
{
  "questions": [
    {
      "Question": "Question text",
      "options__001": "First option",
      "description__001": "Why the first option is right or wrong",
      "options__002": "Second option",
      "description__002": "...",
      "options__003": "Third option",
      "description__003": "...",
      "options__004": "Fourth option",
      "description__004": "...",
      "CorrectAnswer": 1
    }
  ]
}

CorrectAnswer is the number (1-4) of the correct option.`;

function buildGeneratePrompt(request: GenerateQuestionRequest): string {
  const topic = request.subtopic ? `${request.topic} - ${request.subtopic}` : request.topic;
  let prompt = `Create a ${request.difficulty} quiz question for ${request.subject}
on ${topic}
for ${request.grade_level} students.

- 4 MCQ options
- Detailed explanations
- Only one correct answer
`;
  if (request.learning_style) {
    prompt += `- Adapt for ${request.learning_style} learners\n`;
  }
  if (request.additional_context) {
    prompt += `Additional context: ${request.additional_context}\n`;
  }
  return prompt;
}

function buildRegeneratePrompt(request: RegenerateQuestionRequest): string {
  return `Modify this quiz question with instruction: ${request.edit_instruction}

Current question:
${JSON.stringify(request.current_question, null, 2)}

Keep subject=${request.subject}, topic=${request.topic}, grade=${request.grade_level}, difficulty=${request.difficulty}.
Ensure all options and explanations are coherent and only one is correct.`;
}

/**
 * QuestionGenerator writes single multiple-choice questions with OpenAI.
 *
 * Without an API key every call answers with a failure result.
 */
export class QuestionGenerator {
  private client: OpenAI | null;
  private model: string;

  constructor(apiKey?: string, model: string = "gpt-4o-mini") {
    this.client = apiKey ? new OpenAI({ apiKey }) : null;
    this.model = model;
  }

  async generate(request: GenerateQuestionRequest): Promise<GenerateQuestionResult> {
    const question = await this.complete(buildGeneratePrompt(request));
    if (typeof question === "string") {
      return { success: false, error_message: question };
    }
    return { success: true, question };
  }

  async regenerate(request: RegenerateQuestionRequest): Promise<RegenerateQuestionResult> {
    const question = await this.complete(buildRegeneratePrompt(request));
    if (typeof question === "string") {
      return { success: false, error_message: question };
    }
    return {
      success: true,
      regenerated_question: question,
      changes_summary: detectChanges(request.current_question, question),
    };
  }

  /**
   * Returns the first question of the model's answer, or an error message.
   */
  private async complete(userPrompt: string): Promise<QuizQuestion | string> {
    if (!this.client) {
      return "Question generation requires OPENAI_API_KEY";
    }

    try {
      const completion = await this.client.chat.completions.create({
        model: this.model,
        messages: [
          { role: "system", content: SYSTEM_PROMPT },
          { role: "user", content: userPrompt },
        ],
        temperature: 0.7,
        response_format: { type: "json_object" },
      });

      const content = completion.choices[0]?.message?.content;
      if (!content) {
        return "No response from AI";
      }

      const parsed = quizResponseSchema.safeParse(JSON.parse(content));
      if (!parsed.success) {
        console.log("[questions] AI response did not match the question format");
        return "AI response was incomplete";
      }
      return parsed.data.questions[0];
    } catch (error) {
      console.error("[questions] Error generating question:", error);
      return errorMessage(error);
    }
  }
}
