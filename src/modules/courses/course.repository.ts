import type { Course, CourseModule, Lesson } from '../../common/types.js';
import type { NewCourseModule, NewLesson } from './course.model.js';

export interface CourseRepository {
  save(course: Course): Course;
  getById(tenantId: string, id: string): Course | undefined;
  listByOwner(tenantId: string, ownerId: string): Course[];
  /** Appends a module, assigning the next creation sequence within the course. */
  insertModule(module: NewCourseModule): CourseModule;
  getModule(tenantId: string, courseId: string, moduleId: string): CourseModule | undefined;
  listModules(tenantId: string, courseId: string): CourseModule[];
  insertLesson(lesson: NewLesson): Lesson;
  saveLesson(lesson: Lesson): Lesson;
  getLesson(tenantId: string, lessonId: string): Lesson | undefined;
  listLessons(tenantId: string, courseId: string): Lesson[];
  countPublishedLessons(tenantId: string, courseId: string): number;
}

export { createInMemoryCourseRepository } from './course.repository.memory.js';
export { createSQLiteCourseRepository } from './course.repository.sqlite.js';
