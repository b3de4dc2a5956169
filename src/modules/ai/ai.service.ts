import { Inject, Injectable, Logger } from '@nestjs/common';
import { Type, type Schema } from '@google/genai';
import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import { GEMINI_CONFIG, GeminiConfig } from '../../config/gemini.config';
import { GenerationFailedException } from '../../common/exceptions/generation-failed.exception';
import {
  GEMINI_CLIENT,
  GeneratedLesson,
  GeneratedSyllabus,
  Generation,
  GenerativeModelClient,
  GenerativeModelResponse,
  LessonRequest,
  SyllabusRequest,
  TokenUsage,
} from './ai.types';
import { GeneratedCourseDto } from './dto/generated-course.dto';
import { GeneratedLessonContentDto } from './dto/generated-lesson.dto';
import {
  LESSON_SYSTEM_PROMPT,
  SYLLABUS_SYSTEM_PROMPT,
  buildLessonPromptInputs,
  buildSyllabusPromptInputs,
  renderLessonPrompt,
  renderSyllabusPrompt,
} from './prompts';

const SYLLABUS_SCHEMA: Schema = {
  type: Type.OBJECT,
  properties: {
    title: { type: Type.STRING },
    description: { type: Type.STRING },
    modules: {
      type: Type.ARRAY,
      minItems: '1',
      items: {
        type: Type.OBJECT,
        properties: {
          title: { type: Type.STRING },
          order_index: { type: Type.INTEGER },
          lessons: {
            type: Type.ARRAY,
            minItems: '1',
            items: {
              type: Type.OBJECT,
              properties: {
                title: { type: Type.STRING },
                description: { type: Type.STRING },
                order_index: { type: Type.INTEGER },
              },
              required: ['title', 'description', 'order_index'],
            },
          },
        },
        required: ['title', 'order_index', 'lessons'],
      },
    },
  },
  required: ['title', 'description', 'modules'],
};

const LESSON_SCHEMA: Schema = {
  type: Type.OBJECT,
  properties: {
    content_markdown: { type: Type.STRING },
    quiz: {
      type: Type.ARRAY,
      minItems: '3',
      maxItems: '3',
      items: {
        type: Type.OBJECT,
        properties: {
          question: { type: Type.STRING },
          options: {
            type: Type.ARRAY,
            minItems: '4',
            maxItems: '4',
            items: { type: Type.STRING },
          },
          correct_answer_index: { type: Type.INTEGER },
          explanation: { type: Type.STRING },
        },
        required: ['question', 'options', 'correct_answer_index', 'explanation'],
      },
    },
  },
  required: ['content_markdown', 'quiz'],
};

export function extractTokenUsage(
  response: GenerativeModelResponse,
): TokenUsage {
  const usage = response.usageMetadata;
  const inputTokens = usage?.promptTokenCount ?? 0;
  const outputTokens =
    (usage?.candidatesTokenCount ?? 0) + (usage?.thoughtsTokenCount ?? 0);

  return {
    inputTokens,
    outputTokens,
    totalTokens: usage?.totalTokenCount || inputTokens + outputTokens,
  };
}

/**
 * Pulls the JSON document out of a model reply, tolerating a markdown fence
 * around it.
 */
export function parseJsonObject(text: string | undefined): Record<string, unknown> {
  if (!text || !text.trim()) {
    throw new Error('Model returned an empty response');
  }

  const fenced = /^```(?:json)?\s*([\s\S]*?)\s*```$/.exec(text.trim());
  const parsed: unknown = JSON.parse(fenced ? fenced[1] : text);

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error('Model response is not a JSON object');
  }

  return Object.fromEntries(Object.entries(parsed));
}

async function validateAs<T extends object>(
  cls: new () => T,
  plain: Record<string, unknown>,
): Promise<T> {
  const instance = plainToInstance(cls, plain);
  const errors = await validate(instance);

  if (errors.length > 0) {
    const properties = errors.map((error) => error.property).join(', ');
    throw new Error(`Model response failed validation on: ${properties}`);
  }

  return instance;
}

function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === 'string' ? error : 'Unknown error';
}

@Injectable()
export class AiService {
  private readonly logger = new Logger(AiService.name);

  constructor(
    @Inject(GEMINI_CLIENT) private readonly client: GenerativeModelClient,
    @Inject(GEMINI_CONFIG) private readonly config: GeminiConfig,
  ) {}

  async generateCourseSyllabus(
    request: SyllabusRequest,
  ): Promise<Generation<GeneratedSyllabus>> {
    const inputs = buildSyllabusPromptInputs(request);

    try {
      const response = await this.callModel(
        SYLLABUS_SYSTEM_PROMPT,
        renderSyllabusPrompt(inputs),
        SYLLABUS_SCHEMA,
      );
      const course = await validateAs(
        GeneratedCourseDto,
        parseJsonObject(response.text),
      );

      const result: GeneratedSyllabus = {
        title: course.title.trim(),
        description: course.description.trim(),
        modules: course.modules.map((module, moduleIndex) => ({
          title: module.title.trim(),
          orderIndex: moduleIndex + 1,
          lessons: module.lessons.map((lesson, lessonIndex) => ({
            title: lesson.title.trim(),
            description: lesson.description?.trim() || null,
            orderIndex: lessonIndex + 1,
          })),
        })),
      };

      return { result, usage: extractTokenUsage(response) };
    } catch (error: unknown) {
      this.logger.error(
        `Syllabus generation failed for topic "${inputs.topic}": ${describeError(error)}`,
      );
      throw new GenerationFailedException(
        'Course generation failed. Please try again.',
      );
    }
  }

  async generateLessonContent(
    request: LessonRequest,
  ): Promise<Generation<GeneratedLesson>> {
    const inputs = buildLessonPromptInputs(request);

    try {
      const response = await this.callModel(
        LESSON_SYSTEM_PROMPT,
        renderLessonPrompt(inputs),
        LESSON_SCHEMA,
      );
      const lesson = await validateAs(
        GeneratedLessonContentDto,
        parseJsonObject(response.text),
      );

      const result: GeneratedLesson = {
        contentMarkdown: lesson.content_markdown,
        quiz: lesson.quiz.map((question) => ({
          question: question.question,
          options: [...question.options],
          correct_answer_index: question.correct_answer_index,
          explanation: question.explanation,
        })),
      };

      return { result, usage: extractTokenUsage(response) };
    } catch (error: unknown) {
      this.logger.error(
        `Lesson generation failed for "${inputs.lessonTitle}": ${describeError(error)}`,
      );
      throw new GenerationFailedException();
    }
  }

  private async callModel(
    systemInstruction: string,
    prompt: string,
    responseSchema: Schema,
  ): Promise<GenerativeModelResponse> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () =>
          reject(
            new Error(`Model call timed out after ${this.config.timeoutMs}ms`),
          ),
        this.config.timeoutMs,
      );
    });

    try {
      return await Promise.race([
        this.client.generateContent({
          model: this.config.model,
          contents: prompt,
          config: {
            systemInstruction,
            temperature: 0.1,
            responseMimeType: 'application/json',
            responseSchema,
          },
        }),
        timeout,
      ]);
    } finally {
      clearTimeout(timer);
    }
  }
}
