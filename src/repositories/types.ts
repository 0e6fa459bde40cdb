// ============================================
// src/repositories/types.ts
// Storage contracts the services are written against.
// ============================================

import type { UserRole } from '../models/user';
import type { PaymentStatus } from '../models/Payment';
import type { RegistrationStatus } from '../models/EventRegistration';
import type { EventType } from '../models/Event';

export interface UserRecord {
  id: string;
  name: string;
  email: string;
  phone: string | null;
  role: UserRole;
}

export interface CourseRecord {
  id: string;
  title: string;
  price: number;
  image: string | null;
  studentsCount: number;
}

export interface LectureRecord {
  id: string;
  courseId: string;
  title: string;
  duration: number;
  order: number;
}

export interface EnrollmentRecord {
  id: string;
  userId: string;
  courseId: string;
  progress: number;
  completed: boolean;
  completedAt: Date | null;
  enrolledAt: Date;
}

export interface EnrollmentAggregate {
  progress: number;
  completed: boolean;
  completedAt: Date | null;
}

export interface LectureProgressRecord {
  id: string;
  enrollmentId: string;
  lectureId: string;
  watchedDuration: number;
  completed: boolean;
  completedAt: Date | null;
}

export type LectureProgressPatch = Partial<Pick<LectureProgressRecord, 'watchedDuration' | 'completed' | 'completedAt'>>;

export interface CertificateRecord {
  id: string;
  userId: string;
  courseId: string;
  certificateNumber: string;
  certificateUrl: string;
  issuedAt: Date;
}

export interface BadgeRecord {
  id: string;
  userId: string;
  name: string;
  description: string;
  icon: string;
  awardedAt: Date;
}

export interface PaymentRecord {
  id: string;
  userId: string;
  courseId: string | null;
  eventId: string | null;
  amount: number;
  currency: string;
  paymentMethod: string;
  transactionId: string;
  status: PaymentStatus;
  gatewayResponse: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface EventRecord {
  id: string;
  title: string;
  description: string;
  eventType: EventType;
  date: Date;
  time: string;
  duration: number;
  location: string | null;
  eventUrl: string | null;
  capacity: number;
  registered: number;
}

export interface EventSearch {
  /** Case-insensitive substring of title or description. */
  text?: string;
  eventType?: EventType;
  /** Inclusive lower bound on `date`. */
  from?: Date;
  /** Exclusive upper bound on `date`. */
  until?: Date;
  limit: number;
  offset: number;
}

export interface EventPage {
  items: EventRecord[];
  /** Matches before paging. */
  total: number;
}

export interface EventRegistrationRecord {
  id: string;
  userId: string;
  eventId: string;
  status: RegistrationStatus;
  registeredAt: Date;
}

// ─────────────────────────────────────────────────────────────
// Repositories
// ─────────────────────────────────────────────────────────────

export interface UserRepository {
  findById(id: string): Promise<UserRecord | null>;
}

export interface CourseRepository {
  findById(id: string): Promise<CourseRecord | null>;
  findManyByIds(ids: string[]): Promise<CourseRecord[]>;
  incrementStudents(courseId: string): Promise<void>;
}

export interface LectureRepository {
  findById(id: string): Promise<LectureRecord | null>;
  /** Lectures of a course sorted by display order. */
  listByCourse(courseId: string): Promise<LectureRecord[]>;
}

export interface EnrollmentRepository {
  findById(id: string): Promise<EnrollmentRecord | null>;
  findByUserAndCourse(userId: string, courseId: string): Promise<EnrollmentRecord | null>;
  listByUser(userId: string): Promise<EnrollmentRecord[]>;
  /** @throws DuplicateKeyError('user_course_unique') */
  insert(data: { userId: string; courseId: string; enrolledAt: Date }): Promise<EnrollmentRecord>;
  updateAggregate(id: string, aggregate: EnrollmentAggregate): Promise<EnrollmentRecord>;
  /** Takes the per-enrollment write lock for the rest of the transaction. */
  lock(id: string): Promise<void>;
}

export interface LectureProgressRepository {
  find(enrollmentId: string, lectureId: string): Promise<LectureProgressRecord | null>;
  listByEnrollment(enrollmentId: string): Promise<LectureProgressRecord[]>;
  /** @throws DuplicateKeyError('enrollment_lecture_unique') */
  insert(data: Omit<LectureProgressRecord, 'id'>): Promise<LectureProgressRecord>;
  update(id: string, patch: LectureProgressPatch): Promise<LectureProgressRecord>;
  countCompleted(enrollmentId: string, lectureIds: string[]): Promise<number>;
}

export interface CertificateRepository {
  findByUserAndCourse(userId: string, courseId: string): Promise<CertificateRecord | null>;
  findByNumber(certificateNumber: string): Promise<CertificateRecord | null>;
  listByUser(userId: string): Promise<CertificateRecord[]>;
  countByUser(userId: string): Promise<number>;
  /** @throws DuplicateKeyError('user_course_unique' | 'certificate_number_unique') */
  insert(data: Omit<CertificateRecord, 'id'>): Promise<CertificateRecord>;
}

export interface BadgeRepository {
  /** @throws DuplicateKeyError('user_badge_unique') */
  insert(data: Omit<BadgeRecord, 'id'>): Promise<BadgeRecord>;
  countByUser(userId: string): Promise<number>;
}

export interface PaymentRepository {
  findByTransactionId(transactionId: string): Promise<PaymentRecord | null>;
  listByUser(userId: string): Promise<PaymentRecord[]>;
  insert(data: Omit<PaymentRecord, 'id' | 'createdAt' | 'updatedAt'>): Promise<PaymentRecord>;
  updateStatus(id: string, status: PaymentStatus, gatewayResponse?: string | null): Promise<PaymentRecord>;
}

export interface EventRepository {
  findById(id: string): Promise<EventRecord | null>;
  findManyByIds(ids: string[]): Promise<EventRecord[]>;
  /** Matching events sorted by date ascending. */
  search(filter: EventSearch): Promise<EventPage>;
  /** Conditional increment of `registered`; false when the event is full. */
  reserveSeat(eventId: string): Promise<boolean>;
}

export interface EventRegistrationRepository {
  findByUserAndEvent(userId: string, eventId: string): Promise<EventRegistrationRecord | null>;
  listByUser(userId: string): Promise<EventRegistrationRecord[]>;
  /** @throws DuplicateKeyError('user_event_unique') */
  insert(data: Omit<EventRegistrationRecord, 'id'>): Promise<EventRegistrationRecord>;
}

export interface Repositories {
  users: UserRepository;
  courses: CourseRepository;
  lectures: LectureRepository;
  enrollments: EnrollmentRepository;
  lectureProgress: LectureProgressRepository;
  certificates: CertificateRepository;
  badges: BadgeRepository;
  payments: PaymentRepository;
  events: EventRepository;
  registrations: EventRegistrationRepository;
}

export interface LmsStore extends Repositories {
  /**
   * Runs `work` atomically. Writes made through the repositories handed to
   * `work` are rolled back if it throws. `work` may be re-run on transient
   * write conflicts, so it must only touch the store.
   */
  transaction<T>(work: (tx: Repositories) => Promise<T>): Promise<T>;
}
