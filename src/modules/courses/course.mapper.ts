import {
  Course,
  CourseLanguage,
  PreferredLevel,
} from '../../entities/course.entity';
import { CourseModule } from '../../entities/course-module.entity';
import {
  Lesson,
  LessonGenerationStatus,
  QuizQuestion,
} from '../../entities/lesson.entity';
import { UserProgress } from '../../entities/user-progress.entity';

export interface LessonOutlineResponse {
  id: string;
  module_id: string;
  title: string;
  description: string | null;
  order_index: number;
  generation_status: LessonGenerationStatus;
}

export interface ModuleResponse {
  id: string;
  course_id: string;
  title: string;
  order_index: number;
  lessons: LessonOutlineResponse[];
}

export interface CourseResponse {
  id: string;
  title: string;
  description: string | null;
  topic: string;
  learning_goal: string | null;
  preferred_level: PreferredLevel | null;
  language: CourseLanguage;
  created_at: Date;
  progress_percentage: number;
  modules: ModuleResponse[];
}

export interface ProgressResponse {
  id: string;
  lesson_id: string;
  is_completed: boolean;
  quiz_score: number | null;
  updated_at: Date;
}

export interface LessonContentResponse {
  id: string;
  module_id: string;
  course_id: string;
  title: string;
  description: string | null;
  content: string | null;
  quiz_data: QuizQuestion[] | null;
  generated_at: Date | null;
  progress: ProgressResponse[];
}

const byOrderIndex = (a: { orderIndex: number }, b: { orderIndex: number }) =>
  a.orderIndex - b.orderIndex;

/**
 * Completed lessons over total lessons, as a percentage with one decimal.
 */
export function progressPercentage(
  completedLessons: number,
  totalLessons: number,
): number {
  if (totalLessons === 0) {
    return 0;
  }
  return Math.round((completedLessons * 1000) / totalLessons) / 10;
}

export const toModuleResponse = (module: CourseModule): ModuleResponse => ({
  id: module.id,
  course_id: module.courseId,
  title: module.title,
  order_index: module.orderIndex,
  lessons: [...(module.lessons ?? [])].sort(byOrderIndex).map((lesson) => ({
    id: lesson.id,
    module_id: lesson.moduleId,
    title: lesson.title,
    description: lesson.description,
    order_index: lesson.orderIndex,
    generation_status: lesson.generationStatus,
  })),
});

export const toCourseResponse = (
  course: Course,
  completedLessons = 0,
): CourseResponse => {
  const modules = [...(course.modules ?? [])].sort(byOrderIndex);
  const totalLessons = modules.reduce(
    (sum, module) => sum + (module.lessons?.length ?? 0),
    0,
  );

  return {
    id: course.id,
    title: course.title,
    description: course.description,
    topic: course.topic,
    learning_goal: course.learningGoal,
    preferred_level: course.preferredLevel,
    language: course.language,
    created_at: course.createdAt,
    progress_percentage: progressPercentage(completedLessons, totalLessons),
    modules: modules.map(toModuleResponse),
  };
};

export const toProgressResponse = (progress: UserProgress): ProgressResponse => ({
  id: progress.id,
  lesson_id: progress.lessonId,
  is_completed: progress.isCompleted,
  quiz_score: progress.quizScore,
  updated_at: progress.updatedAt,
});

export const toLessonContentResponse = (
  lesson: Lesson,
  courseId: string,
  progress: UserProgress[],
): LessonContentResponse => ({
  id: lesson.id,
  module_id: lesson.moduleId,
  course_id: courseId,
  title: lesson.title,
  description: lesson.description,
  content: lesson.content,
  quiz_data: lesson.quizData,
  generated_at: lesson.generatedAt,
  progress: progress.map(toProgressResponse),
});
