// ============================================
// src/services/lectureProgressService.ts
// ============================================

import type {
  EnrollmentRecord,
  LectureProgressPatch,
  LectureProgressRecord,
  LectureRecord,
  LmsStore,
  Repositories,
} from '../repositories/types';
import { DuplicateKeyError, ForbiddenError, NotFoundError, ValidationError } from '../utils/errors';
import { pickDefined, roundTo } from '../utils/pickFields';
import type { EnrollmentLedger } from './enrollmentLedger';

export interface ProgressUpdateInput {
  watchedDuration?: number;
  completed?: boolean;
}

const UPDATABLE_FIELDS = ['watchedDuration', 'completed'] as const;

export interface ProgressUpdateResult {
  lectureProgressId: string;
  overallProgress: number;
  courseCompleted: boolean;
}

export interface LectureProgressView {
  lectureId: string;
  title: string;
  order: number;
  duration: number;
  completed: boolean;
  watchedDuration: number;
  completedAt: string | null;
}

export interface CourseProgressView {
  enrollmentId: string;
  courseId: string;
  progress: number;
  completed: boolean;
  completedAt: string | null;
  totalLectures: number;
  completedLectures: number;
  lectures: LectureProgressView[];
}

export class LectureProgressService {
  constructor(
    private readonly store: LmsStore,
    private readonly ledger: EnrollmentLedger,
    private readonly now: () => Date = () => new Date()
  ) {}

  async upsertProgress(userId: string, lectureId: string, input: ProgressUpdateInput): Promise<ProgressUpdateResult> {
    const update = pickDefined(input, UPDATABLE_FIELDS);
    if (update.watchedDuration === undefined && update.completed === undefined) {
      throw new ValidationError('Provide watchedDuration or completed', [
        { field: 'watchedDuration', message: 'Nothing to update' },
      ]);
    }
    if (update.watchedDuration !== undefined && (!Number.isInteger(update.watchedDuration) || update.watchedDuration < 0)) {
      throw new ValidationError('watchedDuration must be a non-negative integer', [
        { field: 'watchedDuration', message: 'Must be a non-negative integer' },
      ]);
    }

    const lecture = await this.store.lectures.findById(lectureId);
    if (!lecture) throw new NotFoundError('Lecture not found');

    const enrollment = await this.store.enrollments.findByUserAndCourse(userId, lecture.courseId);
    if (!enrollment) throw new ForbiddenError('Not enrolled in this course');

    try {
      return await this.store.transaction((tx) => this.apply(tx, enrollment.id, lecture, update));
    } catch (error) {
      // Two first writes for the same lecture raced; the row exists now.
      if (error instanceof DuplicateKeyError && error.index === 'enrollment_lecture_unique') {
        return this.store.transaction((tx) => this.apply(tx, enrollment.id, lecture, update));
      }
      throw error;
    }
  }

  async getProgress(userId: string, courseId: string): Promise<CourseProgressView> {
    const enrollment = await this.store.enrollments.findByUserAndCourse(userId, courseId);
    if (!enrollment) throw new NotFoundError('Not enrolled in this course');

    const [lectures, rows] = await Promise.all([
      this.store.lectures.listByCourse(courseId),
      this.store.lectureProgress.listByEnrollment(enrollment.id),
    ]);
    const rowByLecture = new Map(rows.map((row) => [row.lectureId, row]));

    const views = lectures.map((lecture): LectureProgressView => {
      const row = rowByLecture.get(lecture.id);
      return {
        lectureId: lecture.id,
        title: lecture.title,
        order: lecture.order,
        duration: lecture.duration,
        completed: row?.completed ?? false,
        watchedDuration: row?.watchedDuration ?? 0,
        completedAt: row?.completedAt?.toISOString() ?? null,
      };
    });

    return {
      enrollmentId: enrollment.id,
      courseId,
      progress: roundTo(enrollment.progress),
      completed: enrollment.completed,
      completedAt: enrollment.completedAt?.toISOString() ?? null,
      totalLectures: views.length,
      completedLectures: views.filter((v) => v.completed).length,
      lectures: views,
    };
  }

  private async apply(
    tx: Repositories,
    enrollmentId: string,
    lecture: LectureRecord,
    update: ProgressUpdateInput
  ): Promise<ProgressUpdateResult> {
    await tx.enrollments.lock(enrollmentId);
    const enrollment = await this.reload(tx, enrollmentId);
    const row = await this.write(tx, enrollment.id, lecture.id, update);

    const lectures = await tx.lectures.listByCourse(lecture.courseId);
    const completedCount = await tx.lectureProgress.countCompleted(
      enrollment.id,
      lectures.map((l) => l.id)
    );
    const updated = await this.ledger.recompute(tx, enrollment, lectures.length, completedCount);

    return {
      lectureProgressId: row.id,
      overallProgress: roundTo(updated.progress),
      courseCompleted: updated.completed,
    };
  }

  private async write(
    tx: Repositories,
    enrollmentId: string,
    lectureId: string,
    update: ProgressUpdateInput
  ): Promise<LectureProgressRecord> {
    const now = this.now();
    const existing = await tx.lectureProgress.find(enrollmentId, lectureId);

    if (existing) {
      const patch: LectureProgressPatch = { ...update };
      if (update.completed === true && existing.completedAt === null) {
        patch.completedAt = now;
      }
      return tx.lectureProgress.update(existing.id, patch);
    }

    const completed = update.completed ?? false;
    return tx.lectureProgress.insert({
      enrollmentId,
      lectureId,
      watchedDuration: update.watchedDuration ?? 0,
      completed,
      completedAt: completed ? now : null,
    });
  }

  private async reload(tx: Repositories, enrollmentId: string): Promise<EnrollmentRecord> {
    const enrollment = await tx.enrollments.findById(enrollmentId);
    if (!enrollment) throw new NotFoundError('Enrollment not found');
    return enrollment;
  }
}
