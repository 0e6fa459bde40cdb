// ============================================
// src/services/enrollmentLedger.ts
// ============================================

import type { EnrollmentAggregate, EnrollmentRecord, LmsStore, Repositories } from '../repositories/types';
import { RegistrationStatus } from '../models/EventRegistration';
import { ConflictError, DuplicateKeyError, NotFoundError } from '../utils/errors';
import { roundTo } from '../utils/pickFields';
import { Logger } from '../utils/loggers';

export interface EnsureResult {
  enrollment: EnrollmentRecord;
  created: boolean;
}

export interface EnrollmentSummary {
  enrollmentId: string;
  courseId: string;
  title: string;
  image: string | null;
  progress: number;
  completed: boolean;
  completedAt: string | null;
  enrolledAt: string;
}

export interface DashboardOverview {
  totalCourses: number;
  completedCourses: number;
  inProgressCourses: number;
  eventRegistrations: number;
  certificates: number;
  badges: number;
  averageProgress: number;
}

/**
 * Aggregate for an enrollment with `completedLectures` of `totalLectures` done.
 * `completedAt` is stamped the first time the course completes and kept afterwards.
 */
export const computeAggregate = (
  current: Pick<EnrollmentRecord, 'completedAt'>,
  totalLectures: number,
  completedLectures: number,
  now: Date
): EnrollmentAggregate => {
  const progress = totalLectures > 0 ? Math.min(100, (completedLectures / totalLectures) * 100) : 0;
  const completed = totalLectures > 0 && completedLectures === totalLectures;

  return {
    progress,
    completed,
    completedAt: current.completedAt ?? (completed ? now : null),
  };
};

export class EnrollmentLedger {
  constructor(
    private readonly store: LmsStore,
    private readonly now: () => Date = () => new Date()
  ) {}

  /** Admin grant. Fails with Conflict when the user is already enrolled. */
  async create(userId: string, courseId: string): Promise<EnrollmentRecord> {
    try {
      return await this.store.transaction(async (tx) => {
        const course = await tx.courses.findById(courseId);
        if (!course) throw new NotFoundError('Course not found');

        const existing = await tx.enrollments.findByUserAndCourse(userId, courseId);
        if (existing) throw new ConflictError('User is already enrolled in this course', 'ALREADY_ENROLLED');

        const enrollment = await tx.enrollments.insert({ userId, courseId, enrolledAt: this.now() });
        await tx.courses.incrementStudents(courseId);
        return enrollment;
      });
    } catch (error) {
      if (error instanceof DuplicateKeyError) {
        throw new ConflictError('User is already enrolled in this course', 'ALREADY_ENROLLED');
      }
      throw error;
    }
  }

  /**
   * Idempotent enrollment inside the caller's transaction. A concurrent insert
   * surfaces as DuplicateKeyError from the store; the caller re-runs its
   * transaction and this then finds the existing row.
   */
  async ensure(tx: Repositories, userId: string, courseId: string): Promise<EnsureResult> {
    const existing = await tx.enrollments.findByUserAndCourse(userId, courseId);
    if (existing) return { enrollment: existing, created: false };

    const course = await tx.courses.findById(courseId);
    if (!course) throw new NotFoundError('Course not found');

    const enrollment = await tx.enrollments.insert({ userId, courseId, enrolledAt: this.now() });
    await tx.courses.incrementStudents(courseId);
    Logger.info('Enrollment created', { userId, courseId });
    return { enrollment, created: true };
  }

  async recompute(
    tx: Repositories,
    enrollment: EnrollmentRecord,
    totalLectures: number,
    completedLectures: number
  ): Promise<EnrollmentRecord> {
    const aggregate = computeAggregate(enrollment, totalLectures, completedLectures, this.now());
    const updated = await tx.enrollments.updateAggregate(enrollment.id, aggregate);

    if (updated.completed && !enrollment.completed) {
      Logger.success('Course completed', { enrollmentId: enrollment.id, courseId: enrollment.courseId });
    }
    return updated;
  }

  async listForUser(userId: string): Promise<EnrollmentSummary[]> {
    const enrollments = await this.store.enrollments.listByUser(userId);
    const courses = await this.store.courses.findManyByIds(enrollments.map((e) => e.courseId));
    const courseById = new Map(courses.map((c) => [c.id, c]));

    return enrollments.map((enrollment) => {
      const course = courseById.get(enrollment.courseId);
      return {
        enrollmentId: enrollment.id,
        courseId: enrollment.courseId,
        title: course?.title ?? 'Unknown Course',
        image: course?.image ?? null,
        progress: roundTo(enrollment.progress),
        completed: enrollment.completed,
        completedAt: enrollment.completedAt?.toISOString() ?? null,
        enrolledAt: enrollment.enrolledAt.toISOString(),
      };
    });
  }

  async overview(userId: string): Promise<DashboardOverview> {
    const [enrollments, registrations, certificates, badges] = await Promise.all([
      this.store.enrollments.listByUser(userId),
      this.store.registrations.listByUser(userId),
      this.store.certificates.countByUser(userId),
      this.store.badges.countByUser(userId),
    ]);

    const completedCourses = enrollments.filter((e) => e.completed).length;
    const totalProgress = enrollments.reduce((sum, e) => sum + e.progress, 0);

    return {
      totalCourses: enrollments.length,
      completedCourses,
      inProgressCourses: enrollments.length - completedCourses,
      eventRegistrations: registrations.filter((r) => r.status === RegistrationStatus.CONFIRMED).length,
      certificates,
      badges,
      averageProgress: enrollments.length > 0 ? roundTo(totalProgress / enrollments.length) : 0,
    };
  }
}
