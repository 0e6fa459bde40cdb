import type {
  BadgeRecord,
  BadgeRepository,
  CertificateRecord,
  CertificateRepository,
  CourseRecord,
  CourseRepository,
  EnrollmentAggregate,
  EnrollmentRecord,
  EnrollmentRepository,
  EventRecord,
  EventRegistrationRecord,
  EventRegistrationRepository,
  EventRepository,
  LectureProgressPatch,
  LectureProgressRecord,
  LectureProgressRepository,
  LectureRecord,
  LectureRepository,
  LmsStore,
  PaymentRecord,
  PaymentRepository,
  Repositories,
  UserRecord,
  UserRepository,
} from '../../src/repositories/types';
import type { PaymentStatus } from '../../src/models/Payment';
import { UserRole } from '../../src/models/user';
import { EventType } from '../../src/models/Event';
import { DuplicateKeyError } from '../../src/utils/errors';

interface Tables {
  users: UserRecord[];
  courses: CourseRecord[];
  lectures: LectureRecord[];
  enrollments: EnrollmentRecord[];
  lectureProgress: LectureProgressRecord[];
  certificates: CertificateRecord[];
  badges: BadgeRecord[];
  payments: PaymentRecord[];
  events: EventRecord[];
  registrations: EventRegistrationRecord[];
}

const emptyTables = (): Tables => ({
  users: [],
  courses: [],
  lectures: [],
  enrollments: [],
  lectureProgress: [],
  certificates: [],
  badges: [],
  payments: [],
  events: [],
  registrations: [],
});

let sequence = 0;

/** 24 hex chars, so ids pass the same ObjectId checks as real ones. */
export const nextId = (): string => (++sequence).toString(16).padStart(24, '0');

const copy = <T>(value: T): T => structuredClone(value);

const mustFind = <T extends { id: string }>(rows: T[], id: string): T => {
  const row = rows.find((r) => r.id === id);
  if (!row) throw new Error(`No row ${id}`);
  return row;
};

/**
 * In-process LmsStore. Unique keys are enforced like the Mongo indexes,
 * transactions run one at a time and roll back every table on failure.
 */
export class MemoryStore implements LmsStore {
  private data: Tables = emptyTables();
  private queue: Promise<unknown> = Promise.resolve();

  readonly users: UserRepository;
  readonly courses: CourseRepository;
  readonly lectures: LectureRepository;
  readonly enrollments: EnrollmentRepository;
  readonly lectureProgress: LectureProgressRepository;
  readonly certificates: CertificateRepository;
  readonly badges: BadgeRepository;
  readonly payments: PaymentRepository;
  readonly events: EventRepository;
  readonly registrations: EventRegistrationRepository;

  constructor() {
    const t = (): Tables => this.data;

    this.users = {
      findById: async (id) => copy(t().users.find((u) => u.id === id) ?? null),
    };

    this.courses = {
      findById: async (id) => copy(t().courses.find((c) => c.id === id) ?? null),
      findManyByIds: async (ids) => copy(t().courses.filter((c) => ids.includes(c.id))),
      incrementStudents: async (courseId) => {
        const course = t().courses.find((c) => c.id === courseId);
        if (course) course.studentsCount += 1;
      },
    };

    this.lectures = {
      findById: async (id) => copy(t().lectures.find((l) => l.id === id) ?? null),
      listByCourse: async (courseId) =>
        copy(t().lectures.filter((l) => l.courseId === courseId).sort((a, b) => a.order - b.order)),
    };

    this.enrollments = {
      findById: async (id) => copy(t().enrollments.find((e) => e.id === id) ?? null),
      findByUserAndCourse: async (userId, courseId) =>
        copy(t().enrollments.find((e) => e.userId === userId && e.courseId === courseId) ?? null),
      listByUser: async (userId) => copy(t().enrollments.filter((e) => e.userId === userId)),
      insert: async (data) => {
        if (t().enrollments.some((e) => e.userId === data.userId && e.courseId === data.courseId)) {
          throw new DuplicateKeyError('user_course_unique');
        }
        const row: EnrollmentRecord = { id: nextId(), progress: 0, completed: false, completedAt: null, ...data };
        t().enrollments.push(row);
        return copy(row);
      },
      updateAggregate: async (id, aggregate: EnrollmentAggregate) => {
        const row = mustFind(t().enrollments, id);
        Object.assign(row, aggregate);
        return copy(row);
      },
      lock: async (id) => {
        mustFind(t().enrollments, id);
      },
    };

    this.lectureProgress = {
      find: async (enrollmentId, lectureId) =>
        copy(t().lectureProgress.find((p) => p.enrollmentId === enrollmentId && p.lectureId === lectureId) ?? null),
      listByEnrollment: async (enrollmentId) =>
        copy(t().lectureProgress.filter((p) => p.enrollmentId === enrollmentId)),
      insert: async (data) => {
        if (t().lectureProgress.some((p) => p.enrollmentId === data.enrollmentId && p.lectureId === data.lectureId)) {
          throw new DuplicateKeyError('enrollment_lecture_unique');
        }
        const row: LectureProgressRecord = { id: nextId(), ...data };
        t().lectureProgress.push(row);
        return copy(row);
      },
      update: async (id, patch: LectureProgressPatch) => {
        const row = mustFind(t().lectureProgress, id);
        Object.assign(row, patch);
        return copy(row);
      },
      countCompleted: async (enrollmentId, lectureIds) =>
        t().lectureProgress.filter(
          (p) => p.enrollmentId === enrollmentId && p.completed && lectureIds.includes(p.lectureId)
        ).length,
    };

    this.certificates = {
      findByUserAndCourse: async (userId, courseId) =>
        copy(t().certificates.find((c) => c.userId === userId && c.courseId === courseId) ?? null),
      findByNumber: async (number) => copy(t().certificates.find((c) => c.certificateNumber === number) ?? null),
      listByUser: async (userId) => copy(t().certificates.filter((c) => c.userId === userId)),
      countByUser: async (userId) => t().certificates.filter((c) => c.userId === userId).length,
      insert: async (data) => {
        if (t().certificates.some((c) => c.certificateNumber === data.certificateNumber)) {
          throw new DuplicateKeyError('certificate_number_unique');
        }
        if (t().certificates.some((c) => c.userId === data.userId && c.courseId === data.courseId)) {
          throw new DuplicateKeyError('user_course_unique');
        }
        const row: CertificateRecord = { id: nextId(), ...data };
        t().certificates.push(row);
        return copy(row);
      },
    };

    this.badges = {
      insert: async (data) => {
        if (t().badges.some((b) => b.userId === data.userId && b.name === data.name)) {
          throw new DuplicateKeyError('user_badge_unique');
        }
        const row: BadgeRecord = { id: nextId(), ...data };
        t().badges.push(row);
        return copy(row);
      },
      countByUser: async (userId) => t().badges.filter((b) => b.userId === userId).length,
    };

    this.payments = {
      findByTransactionId: async (transactionId) =>
        copy(t().payments.find((p) => p.transactionId === transactionId) ?? null),
      listByUser: async (userId) => copy(t().payments.filter((p) => p.userId === userId)),
      insert: async (data) => {
        if (t().payments.some((p) => p.transactionId === data.transactionId)) {
          throw new DuplicateKeyError('transaction_id_unique');
        }
        const now = new Date();
        const row: PaymentRecord = { id: nextId(), ...data, createdAt: now, updatedAt: now };
        t().payments.push(row);
        return copy(row);
      },
      updateStatus: async (id, status: PaymentStatus, gatewayResponse?: string | null) => {
        const row = mustFind(t().payments, id);
        row.status = status;
        if (gatewayResponse !== undefined) row.gatewayResponse = gatewayResponse;
        row.updatedAt = new Date();
        return copy(row);
      },
    };

    this.events = {
      findById: async (id) => copy(t().events.find((e) => e.id === id) ?? null),
      findManyByIds: async (ids) => copy(t().events.filter((e) => ids.includes(e.id))),
      search: async (filter) => {
        const text = filter.text?.toLowerCase();
        const matches = t()
          .events.filter(
            (e) =>
              (!text || e.title.toLowerCase().includes(text) || e.description.toLowerCase().includes(text)) &&
              (!filter.eventType || e.eventType === filter.eventType) &&
              (!filter.from || e.date >= filter.from) &&
              (!filter.until || e.date < filter.until)
          )
          .sort((a, b) => a.date.getTime() - b.date.getTime() || a.time.localeCompare(b.time));
        return {
          items: copy(matches.slice(filter.offset, filter.offset + filter.limit)),
          total: matches.length,
        };
      },
      reserveSeat: async (eventId) => {
        const event = t().events.find((e) => e.id === eventId);
        if (!event || event.registered >= event.capacity) return false;
        event.registered += 1;
        return true;
      },
    };

    this.registrations = {
      findByUserAndEvent: async (userId, eventId) =>
        copy(t().registrations.find((r) => r.userId === userId && r.eventId === eventId) ?? null),
      listByUser: async (userId) => copy(t().registrations.filter((r) => r.userId === userId)),
      insert: async (data) => {
        if (t().registrations.some((r) => r.userId === data.userId && r.eventId === data.eventId)) {
          throw new DuplicateKeyError('user_event_unique');
        }
        const row: EventRegistrationRecord = { id: nextId(), ...data };
        t().registrations.push(row);
        return copy(row);
      },
    };
  }

  transaction<T>(work: (tx: Repositories) => Promise<T>): Promise<T> {
    const run = this.queue.then(async () => {
      const snapshot = copy(this.data);
      try {
        return await work(this);
      } catch (error) {
        this.data = snapshot;
        throw error;
      }
    });
    this.queue = run.catch(() => undefined);
    return run;
  }

  // ─────────────────────────────────────────────────────────────
  // Seeding and inspection helpers for tests
  // ─────────────────────────────────────────────────────────────

  addUser(overrides: Partial<UserRecord> = {}): UserRecord {
    const row: UserRecord = {
      id: nextId(),
      name: 'Test Learner',
      email: `learner${sequence}@example.com`,
      phone: '+15550000001',
      role: UserRole.STUDENT,
      ...overrides,
    };
    this.data.users.push(row);
    return copy(row);
  }

  addCourse(overrides: Partial<CourseRecord> = {}): CourseRecord {
    const row: CourseRecord = {
      id: nextId(),
      title: 'Intro to Testing',
      price: 499,
      image: null,
      studentsCount: 0,
      ...overrides,
    };
    this.data.courses.push(row);
    return copy(row);
  }

  addLectures(courseId: string, count: number): LectureRecord[] {
    const rows: LectureRecord[] = [];
    for (let order = 1; order <= count; order++) {
      const row: LectureRecord = { id: nextId(), courseId, title: `Lecture ${order}`, duration: 10, order };
      this.data.lectures.push(row);
      rows.push(copy(row));
    }
    return rows;
  }

  addEnrollment(userId: string, courseId: string, enrolledAt = new Date('2025-01-01T00:00:00Z')): EnrollmentRecord {
    const row: EnrollmentRecord = {
      id: nextId(),
      userId,
      courseId,
      progress: 0,
      completed: false,
      completedAt: null,
      enrolledAt,
    };
    this.data.enrollments.push(row);
    return copy(row);
  }

  addEvent(overrides: Partial<EventRecord> = {}): EventRecord {
    const row: EventRecord = {
      id: nextId(),
      title: 'Live Q&A',
      description: 'Ask anything',
      eventType: EventType.WEBINAR,
      date: new Date('2025-03-01T00:00:00Z'),
      time: '18:30',
      duration: 60,
      location: null,
      eventUrl: 'https://meet.example.com/qa',
      capacity: 10,
      registered: 0,
      ...overrides,
    };
    this.data.events.push(row);
    return copy(row);
  }

  snapshot(): Tables {
    return copy(this.data);
  }
}
