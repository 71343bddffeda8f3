import { v4 as uuid } from 'uuid';
import type { Course, CourseModule, Lesson } from '../../common/types.js';

export interface CourseInput {
  tenantId: string;
  ownerId: string;
  title: string;
  description?: string;
}

export function createCourse(input: CourseInput): Course {
  const now = new Date().toISOString();
  return {
    id: uuid(),
    tenantId: input.tenantId,
    ownerId: input.ownerId,
    title: input.title.trim(),
    description: input.description?.trim() || undefined,
    createdAt: now,
    updatedAt: now,
  };
}

export type NewCourseModule = Omit<CourseModule, 'sequence'>;
export type NewLesson = Omit<Lesson, 'sequence'>;

export function createModuleDraft(input: { tenantId: string; courseId: string; title: string; position: number }): NewCourseModule {
  const now = new Date().toISOString();
  return { id: uuid(), ...input, title: input.title.trim(), createdAt: now, updatedAt: now };
}

export function createLessonDraft(input: {
  tenantId: string;
  courseId: string;
  moduleId: string;
  title: string;
  position: number;
}): NewLesson {
  const now = new Date().toISOString();
  return { id: uuid(), ...input, title: input.title.trim(), status: 'draft', createdAt: now, updatedAt: now };
}

export function publishLesson(lesson: Lesson): Lesson {
  if (lesson.status === 'published') {
    return lesson;
  }
  const now = new Date().toISOString();
  return { ...lesson, status: 'published', publishedAt: now, updatedAt: now };
}

/** Total order inside a parent: explicit position first, then creation sequence. */
export function compareByPosition(a: { position: number; sequence: number }, b: { position: number; sequence: number }): number {
  return a.position - b.position || a.sequence - b.sequence;
}

export interface CourseOutline {
  course: Course;
  modules: Array<CourseModule & { lessons: Lesson[] }>;
}

export function buildOutline(course: Course, modules: CourseModule[], lessons: Lesson[], includeDrafts: boolean): CourseOutline {
  const visible = includeDrafts ? lessons : lessons.filter(lesson => lesson.status === 'published');
  return {
    course,
    modules: [...modules].sort(compareByPosition).map(module => ({
      ...module,
      lessons: visible.filter(lesson => lesson.moduleId === module.id).sort(compareByPosition),
    })),
  };
}
