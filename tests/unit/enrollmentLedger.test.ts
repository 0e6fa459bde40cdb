import { describe, it, expect, beforeEach, vi } from 'vitest';
import { EnrollmentLedger, computeAggregate } from '../../src/services/enrollmentLedger';
import { ConflictError, NotFoundError } from '../../src/utils/errors';
import { MemoryStore } from '../support/memoryStore';
import { fixedClock } from '../support/fakes';

describe('computeAggregate', () => {
  const now = new Date('2025-06-15T10:00:00Z');

  it('reports zero progress for a course without lectures', () => {
    expect(computeAggregate({ completedAt: null }, 0, 0, now)).toEqual({
      progress: 0,
      completed: false,
      completedAt: null,
    });
  });

  it('computes the ratio while incomplete', () => {
    const aggregate = computeAggregate({ completedAt: null }, 4, 1, now);
    expect(aggregate.progress).toBe(25);
    expect(aggregate.completed).toBe(false);
    expect(aggregate.completedAt).toBeNull();
  });

  it('stamps completedAt when every lecture is done', () => {
    expect(computeAggregate({ completedAt: null }, 2, 2, now)).toEqual({
      progress: 100,
      completed: true,
      completedAt: now,
    });
  });

  it('keeps the first completion time', () => {
    const first = new Date('2025-01-01T00:00:00Z');
    expect(computeAggregate({ completedAt: first }, 2, 2, now).completedAt).toBe(first);
  });

  it('keeps completedAt when the course drops back below 100', () => {
    const first = new Date('2025-01-01T00:00:00Z');
    const aggregate = computeAggregate({ completedAt: first }, 2, 1, now);
    expect(aggregate.completed).toBe(false);
    expect(aggregate.progress).toBe(50);
    expect(aggregate.completedAt).toBe(first);
  });
});

describe('EnrollmentLedger', () => {
  let store: MemoryStore;
  let ledger: EnrollmentLedger;

  beforeEach(() => {
    store = new MemoryStore();
    ledger = new EnrollmentLedger(store, fixedClock());
  });

  describe('create', () => {
    it('creates an empty enrollment and bumps the course counter', async () => {
      const user = store.addUser();
      const course = store.addCourse();

      const enrollment = await ledger.create(user.id, course.id);

      expect(enrollment).toMatchObject({
        userId: user.id,
        courseId: course.id,
        progress: 0,
        completed: false,
        completedAt: null,
      });
      expect(enrollment.enrolledAt.toISOString()).toBe('2025-06-15T10:00:00.000Z');
      expect((await store.courses.findById(course.id))?.studentsCount).toBe(1);
    });

    it('rejects an unknown course', async () => {
      const user = store.addUser();
      await expect(ledger.create(user.id, 'ffffffffffffffffffffffff')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('rejects a second enrollment for the same pair', async () => {
      const user = store.addUser();
      const course = store.addCourse();
      await ledger.create(user.id, course.id);

      await expect(ledger.create(user.id, course.id)).rejects.toMatchObject({
        statusCode: 409,
        code: 'ALREADY_ENROLLED',
      });
      expect((await store.courses.findById(course.id))?.studentsCount).toBe(1);
    });

    it('maps a unique-index race to Conflict', async () => {
      const user = store.addUser();
      const course = store.addCourse();
      store.addEnrollment(user.id, course.id);
      vi.spyOn(store.enrollments, 'findByUserAndCourse').mockResolvedValueOnce(null);

      await expect(ledger.create(user.id, course.id)).rejects.toBeInstanceOf(ConflictError);
      expect((await store.courses.findById(course.id))?.studentsCount).toBe(0);
    });
  });

  describe('ensure', () => {
    it('creates once and then returns the existing row', async () => {
      const user = store.addUser();
      const course = store.addCourse();

      const first = await store.transaction((tx) => ledger.ensure(tx, user.id, course.id));
      const second = await store.transaction((tx) => ledger.ensure(tx, user.id, course.id));

      expect(first.created).toBe(true);
      expect(second.created).toBe(false);
      expect(second.enrollment.id).toBe(first.enrollment.id);
      expect((await store.courses.findById(course.id))?.studentsCount).toBe(1);
    });
  });

  describe('dashboard listings', () => {
    it('lists enrollments with course details', async () => {
      const user = store.addUser();
      const course = store.addCourse({ title: 'Data Basics', image: 'https://img.example.com/c.png' });
      const enrollment = store.addEnrollment(user.id, course.id);

      expect(await ledger.listForUser(user.id)).toEqual([
        {
          enrollmentId: enrollment.id,
          courseId: course.id,
          title: 'Data Basics',
          image: 'https://img.example.com/c.png',
          progress: 0,
          completed: false,
          completedAt: null,
          enrolledAt: '2025-01-01T00:00:00.000Z',
        },
      ]);
    });

    it('summarises counts and average progress', async () => {
      const user = store.addUser();
      const done = store.addCourse();
      const started = store.addCourse();
      const a = store.addEnrollment(user.id, done.id);
      const b = store.addEnrollment(user.id, started.id);
      await store.enrollments.updateAggregate(a.id, { progress: 100, completed: true, completedAt: new Date() });
      await store.enrollments.updateAggregate(b.id, { progress: 100 / 3, completed: false, completedAt: null });

      expect(await ledger.overview(user.id)).toEqual({
        totalCourses: 2,
        completedCourses: 1,
        inProgressCourses: 1,
        eventRegistrations: 0,
        certificates: 0,
        badges: 0,
        averageProgress: 66.67,
      });
    });
  });
});
