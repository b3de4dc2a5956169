import type { GenerateContentParameters } from '@google/genai';
import {
  CourseLanguage,
  PreferredLevel,
} from '../../entities/course.entity';
import { QuizQuestion } from '../../entities/lesson.entity';

export const GEMINI_CLIENT = 'GEMINI_CLIENT';

export interface GenerativeModelResponse {
  text?: string;
  usageMetadata?: {
    promptTokenCount?: number;
    candidatesTokenCount?: number;
    thoughtsTokenCount?: number;
    totalTokenCount?: number;
  };
}

/**
 * The slice of the Gemini `models` API the service calls.
 */
export interface GenerativeModelClient {
  generateContent(
    params: GenerateContentParameters,
  ): Promise<GenerativeModelResponse>;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export interface SyllabusRequest {
  topic: string;
  learningGoal?: string | null;
  preferredLevel?: PreferredLevel | null;
  language?: CourseLanguage | null;
}

export interface LessonRequest {
  courseTitle: string;
  moduleTitle: string;
  lessonTitle: string;
  lessonDescription?: string | null;
  learningGoal?: string | null;
  preferredLevel?: PreferredLevel | null;
  language?: CourseLanguage | null;
}

export interface SyllabusLesson {
  title: string;
  description: string | null;
  orderIndex: number;
}

export interface SyllabusModule {
  title: string;
  orderIndex: number;
  lessons: SyllabusLesson[];
}

export interface GeneratedSyllabus {
  title: string;
  description: string;
  modules: SyllabusModule[];
}

export interface GeneratedLesson {
  contentMarkdown: string;
  quiz: QuizQuestion[];
}

export interface Generation<T> {
  result: T;
  usage: TokenUsage;
}
