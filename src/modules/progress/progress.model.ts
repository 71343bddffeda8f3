import type { ProgressAggregate } from '../../common/types.js';
import { roundedPercentage } from '../scoring/scoring.service.js';

export interface ProgressAggregateRecord {
  tenantId: string;
  learnerId: string;
  courseId: string;
  totalLessons: number;
  createdAt: string;
  updatedAt: string;
}

/** Count and percentage are always derived from the completed set, never stored. */
export function toAggregate(record: ProgressAggregateRecord, completedLessonIds: string[]): ProgressAggregate {
  const completedCount = completedLessonIds.length;
  return {
    ...record,
    completedLessonIds,
    completedCount,
    percentage: roundedPercentage(completedCount, record.totalLessons),
  };
}

export function emptyAggregate(tenantId: string, learnerId: string, courseId: string, totalLessons: number): ProgressAggregate {
  const now = new Date().toISOString();
  return toAggregate({ tenantId, learnerId, courseId, totalLessons, createdAt: now, updatedAt: now }, []);
}
