import { CourseModule } from '../../entities/course-module.entity';
import { Lesson, LessonGenerationStatus } from '../../entities/lesson.entity';
import { progressPercentage, toModuleResponse } from './course.mapper';

describe('course mapper', () => {
  describe('progressPercentage', () => {
    it('rounds to one decimal', () => {
      expect(progressPercentage(1, 3)).toBe(33.3);
      expect(progressPercentage(2, 3)).toBe(66.7);
      expect(progressPercentage(3, 3)).toBe(100);
    });

    it('is 0 for a course without lessons', () => {
      expect(progressPercentage(0, 0)).toBe(0);
    });
  });

  it('orders lessons by their position', () => {
    const lesson = (id: string, orderIndex: number) =>
      Object.assign(new Lesson(), {
        id,
        moduleId: 'module-1',
        title: `Lesson ${id}`,
        description: null,
        orderIndex,
        generationStatus: LessonGenerationStatus.UNINITIALIZED,
      });

    const module = Object.assign(new CourseModule(), {
      id: 'module-1',
      courseId: 'course-1',
      title: 'Basics',
      orderIndex: 1,
      lessons: [lesson('b', 2), lesson('c', 3), lesson('a', 1)],
    });

    expect(toModuleResponse(module).lessons.map((item) => item.id)).toEqual([
      'a',
      'b',
      'c',
    ]);
  });
});
