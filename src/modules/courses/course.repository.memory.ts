import type { Course, CourseModule, Lesson } from '../../common/types.js';
import { compareByPosition } from './course.model.js';
import type { CourseRepository } from './course.repository.js';

function keyOf(tenantId: string, id: string): string {
  return `${tenantId}::${id}`;
}

export function createInMemoryCourseRepository(): CourseRepository {
  const courses = new Map<string, Course>();
  const modules = new Map<string, CourseModule>();
  const lessons = new Map<string, Lesson>();
  const sequences = new Map<string, number>();

  const nextSequence = (scope: string, tenantId: string, courseId: string) => {
    const key = `${scope}::${keyOf(tenantId, courseId)}`;
    const next = (sequences.get(key) ?? 0) + 1;
    sequences.set(key, next);
    return next;
  };

  const lessonsOf = (tenantId: string, courseId: string) =>
    Array.from(lessons.values()).filter(lesson => lesson.tenantId === tenantId && lesson.courseId === courseId);

  return {
    save(course) {
      courses.set(keyOf(course.tenantId, course.id), course);
      return course;
    },
    getById(tenantId, id) {
      return courses.get(keyOf(tenantId, id));
    },
    listByOwner(tenantId, ownerId) {
      return Array.from(courses.values())
        .filter(course => course.tenantId === tenantId && course.ownerId === ownerId)
        .sort((a, b) => a.createdAt.localeCompare(b.createdAt));
    },
    insertModule(draft) {
      const module: CourseModule = { ...draft, sequence: nextSequence('module', draft.tenantId, draft.courseId) };
      modules.set(keyOf(module.tenantId, module.id), module);
      return module;
    },
    getModule(tenantId, courseId, moduleId) {
      const module = modules.get(keyOf(tenantId, moduleId));
      return module?.courseId === courseId ? module : undefined;
    },
    listModules(tenantId, courseId) {
      return Array.from(modules.values())
        .filter(module => module.tenantId === tenantId && module.courseId === courseId)
        .sort(compareByPosition);
    },
    insertLesson(draft) {
      const lesson: Lesson = { ...draft, sequence: nextSequence('lesson', draft.tenantId, draft.courseId) };
      lessons.set(keyOf(lesson.tenantId, lesson.id), lesson);
      return lesson;
    },
    saveLesson(lesson) {
      lessons.set(keyOf(lesson.tenantId, lesson.id), lesson);
      return lesson;
    },
    getLesson(tenantId, lessonId) {
      return lessons.get(keyOf(tenantId, lessonId));
    },
    listLessons(tenantId, courseId) {
      return lessonsOf(tenantId, courseId).sort(compareByPosition);
    },
    countPublishedLessons(tenantId, courseId) {
      return lessonsOf(tenantId, courseId).filter(lesson => lesson.status === 'published').length;
    },
  };
}
