export interface TenantScoped { tenantId: string; }

export interface BaseEntity extends TenantScoped { id: string; createdAt: string; updatedAt: string; }

/**
 * Advisory label only. Gating decisions go through the ownership and enrollment
 * relations, never through this value.
 */
export const PARTICIPANT_LABELS = ['owner', 'enrollee'] as const;
export type ParticipantLabel = (typeof PARTICIPANT_LABELS)[number];

export interface Participant extends BaseEntity {
	email: string;
	displayName: string;
	label: ParticipantLabel;
}

export interface Course extends BaseEntity {
	ownerId: string;
	title: string;
	description?: string;
}

export interface CourseModule extends BaseEntity {
	courseId: string;
	title: string;
	position: number;
	/** Creation order within the course, assigned by the store. */
	sequence: number;
}

export type LessonStatus = 'draft' | 'published';

export interface Lesson extends BaseEntity {
	courseId: string;
	moduleId: string;
	title: string;
	position: number;
	sequence: number;
	status: LessonStatus;
	publishedAt?: string;
}

export interface Enrollment extends BaseEntity {
	courseId: string;
	enrolleeId: string;
}

export type QuestionKind = 'MULTIPLE_CHOICE' | 'TRUE_FALSE';

export interface Choice {
	id: string;
	text: string;
	correct: boolean;
}

export interface Question {
	id: string;
	kind: QuestionKind;
	prompt: string;
	points: number;
	choices: Choice[];
}

export type AssessmentStatus = 'draft' | 'published';

export interface Assessment extends BaseEntity {
	courseId: string;
	title: string;
	description?: string;
	status: AssessmentStatus;
	publishedAt?: string;
	timeLimitMinutes?: number;
	questions: Question[];
}

export type AttemptState = 'in_progress' | 'completed';

export type CompletionReason = 'submitted' | 'expired';

export interface Attempt extends BaseEntity {
	assessmentId: string;
	courseId: string;
	learnerId: string;
	state: AttemptState;
	startedAt: string;
	completedAt?: string;
	completionReason?: CompletionReason;
	score: number | null;
	earnedPoints?: number;
	totalPoints?: number;
	gradedAt?: string;
}

export interface Answer extends TenantScoped {
	attemptId: string;
	questionId: string;
	choiceId: string;
	answeredAt: string;
}

export interface ProgressAggregate extends TenantScoped {
	learnerId: string;
	courseId: string;
	completedLessonIds: string[];
	completedCount: number;
	totalLessons: number;
	percentage: number;
	createdAt: string;
	updatedAt: string;
}

export type ContentKind = 'lesson' | 'assessment';

export interface ContentRef {
	kind: ContentKind;
	id: string;
	title: string;
}

/** `failed` deliveries are retried on the next fan-out for the same content; `rejected` ones are not. */
export type NotificationStatus = 'pending' | 'sent' | 'failed' | 'rejected';

export interface Notification extends BaseEntity {
	recipientId: string;
	courseId: string;
	contentKind: ContentKind;
	contentId: string;
	title: string;
	body: string;
	status: NotificationStatus;
	deliveryAttempts: number;
	lastError?: string;
	readAt?: string;
}

export interface DomainEvent<TPayload = unknown> { id: string; type: string; occurredAt: string; tenantId: string; payload: TPayload; }
