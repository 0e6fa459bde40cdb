// ============================================
// src/repositories/mongoStore.ts
// Mongoose implementation of the storage contracts.
// ============================================

import mongoose, { ClientSession, type FilterQuery, isValidObjectId } from 'mongoose';
import { User, IUser } from '../models/user';
import { Course, ICourse } from '../models/Course';
import { Lecture, ILecture } from '../models/Lecture';
import { Enrollment, IEnrollment } from '../models/Enrollment';
import { LectureProgress, ILectureProgress } from '../models/LectureProgress';
import { Certificate, ICertificate } from '../models/Certificate';
import { UserBadge, IUserBadge } from '../models/UserBadge';
import { Payment, IPayment, PaymentStatus } from '../models/Payment';
import { Event, IEvent } from '../models/Event';
import { EventRegistration, IEventRegistration } from '../models/EventRegistration';
import { DuplicateKeyError, NotFoundError } from '../utils/errors';
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
  EventPage,
  EventRepository,
  EventSearch,
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
} from './types';

type MongoServerError = InstanceType<typeof mongoose.mongo.MongoServerError>;

const isDuplicateKey = (error: unknown): error is MongoServerError =>
  error instanceof mongoose.mongo.MongoServerError && error.code === 11000;

export const translateDuplicate = (error: unknown, fallbackIndex: string): unknown => {
  if (!isDuplicateKey(error)) return error;
  const match = /index: (\S+)/.exec(error.message);
  return new DuplicateKeyError(match ? match[1] : fallbackIndex);
};

const validIds = (ids: string[]): string[] => ids.filter((id) => isValidObjectId(id));

const escapeRegex = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

// ─────────────────────────────────────────────────────────────
// Document → record mappers
// ─────────────────────────────────────────────────────────────

const toUser = (doc: IUser): UserRecord => ({
  id: doc._id.toString(),
  name: doc.name,
  email: doc.email,
  phone: doc.phone ?? null,
  role: doc.role,
});

const toCourse = (doc: ICourse): CourseRecord => ({
  id: doc._id.toString(),
  title: doc.title,
  price: doc.price,
  image: doc.image ?? null,
  studentsCount: doc.studentsCount,
});

const toLecture = (doc: ILecture): LectureRecord => ({
  id: doc._id.toString(),
  courseId: doc.courseId.toString(),
  title: doc.title,
  duration: doc.duration,
  order: doc.order,
});

const toEnrollment = (doc: IEnrollment): EnrollmentRecord => ({
  id: doc._id.toString(),
  userId: doc.userId.toString(),
  courseId: doc.courseId.toString(),
  progress: doc.progress,
  completed: doc.completed,
  completedAt: doc.completedAt ?? null,
  enrolledAt: doc.enrolledAt,
});

const toLectureProgress = (doc: ILectureProgress): LectureProgressRecord => ({
  id: doc._id.toString(),
  enrollmentId: doc.enrollmentId.toString(),
  lectureId: doc.lectureId.toString(),
  watchedDuration: doc.watchedDuration,
  completed: doc.completed,
  completedAt: doc.completedAt ?? null,
});

const toCertificate = (doc: ICertificate): CertificateRecord => ({
  id: doc._id.toString(),
  userId: doc.userId.toString(),
  courseId: doc.courseId.toString(),
  certificateNumber: doc.certificateNumber,
  certificateUrl: doc.certificateUrl,
  issuedAt: doc.issuedAt,
});

const toBadge = (doc: IUserBadge): BadgeRecord => ({
  id: doc._id.toString(),
  userId: doc.userId.toString(),
  name: doc.name,
  description: doc.description,
  icon: doc.icon,
  awardedAt: doc.awardedAt,
});

const toPayment = (doc: IPayment): PaymentRecord => ({
  id: doc._id.toString(),
  userId: doc.userId.toString(),
  courseId: doc.courseId ? doc.courseId.toString() : null,
  eventId: doc.eventId ? doc.eventId.toString() : null,
  amount: doc.amount,
  currency: doc.currency,
  paymentMethod: doc.paymentMethod,
  transactionId: doc.transactionId,
  status: doc.status,
  gatewayResponse: doc.gatewayResponse ?? null,
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt,
});

const toEvent = (doc: IEvent): EventRecord => ({
  id: doc._id.toString(),
  title: doc.title,
  description: doc.description,
  eventType: doc.eventType,
  date: doc.date,
  time: doc.time,
  duration: doc.duration,
  location: doc.location ?? null,
  eventUrl: doc.eventUrl ?? null,
  capacity: doc.capacity,
  registered: doc.registered,
});

const toRegistration = (doc: IEventRegistration): EventRegistrationRecord => ({
  id: doc._id.toString(),
  userId: doc.userId.toString(),
  eventId: doc.eventId.toString(),
  status: doc.status,
  registeredAt: doc.registeredAt,
});

// ─────────────────────────────────────────────────────────────
// Repositories
// ─────────────────────────────────────────────────────────────

class MongoUserRepository implements UserRepository {
  constructor(private readonly session: ClientSession | null) {}

  async findById(id: string): Promise<UserRecord | null> {
    if (!isValidObjectId(id)) return null;
    const doc = await User.findById(id).session(this.session);
    return doc ? toUser(doc) : null;
  }
}

class MongoCourseRepository implements CourseRepository {
  constructor(private readonly session: ClientSession | null) {}

  async findById(id: string): Promise<CourseRecord | null> {
    if (!isValidObjectId(id)) return null;
    const doc = await Course.findById(id).session(this.session);
    return doc ? toCourse(doc) : null;
  }

  async findManyByIds(ids: string[]): Promise<CourseRecord[]> {
    const docs = await Course.find({ _id: { $in: validIds(ids) } }).session(this.session);
    return docs.map(toCourse);
  }

  async incrementStudents(courseId: string): Promise<void> {
    await Course.updateOne({ _id: courseId }, { $inc: { studentsCount: 1 } }, { session: this.session ?? undefined });
  }
}

class MongoLectureRepository implements LectureRepository {
  constructor(private readonly session: ClientSession | null) {}

  async findById(id: string): Promise<LectureRecord | null> {
    if (!isValidObjectId(id)) return null;
    const doc = await Lecture.findById(id).session(this.session);
    return doc ? toLecture(doc) : null;
  }

  async listByCourse(courseId: string): Promise<LectureRecord[]> {
    if (!isValidObjectId(courseId)) return [];
    const docs = await Lecture.find({ courseId }).sort({ order: 1, _id: 1 }).session(this.session);
    return docs.map(toLecture);
  }
}

class MongoEnrollmentRepository implements EnrollmentRepository {
  constructor(private readonly session: ClientSession | null) {}

  async findById(id: string): Promise<EnrollmentRecord | null> {
    if (!isValidObjectId(id)) return null;
    const doc = await Enrollment.findById(id).session(this.session);
    return doc ? toEnrollment(doc) : null;
  }

  async findByUserAndCourse(userId: string, courseId: string): Promise<EnrollmentRecord | null> {
    if (!isValidObjectId(userId) || !isValidObjectId(courseId)) return null;
    const doc = await Enrollment.findOne({ userId, courseId }).session(this.session);
    return doc ? toEnrollment(doc) : null;
  }

  async listByUser(userId: string): Promise<EnrollmentRecord[]> {
    if (!isValidObjectId(userId)) return [];
    const docs = await Enrollment.find({ userId }).sort({ enrolledAt: -1 }).session(this.session);
    return docs.map(toEnrollment);
  }

  async insert(data: { userId: string; courseId: string; enrolledAt: Date }): Promise<EnrollmentRecord> {
    try {
      const [doc] = await Enrollment.create(
        [{ ...data, progress: 0, completed: false, completedAt: null }],
        { session: this.session }
      );
      return toEnrollment(doc);
    } catch (error) {
      throw translateDuplicate(error, 'user_course_unique');
    }
  }

  async updateAggregate(id: string, aggregate: EnrollmentAggregate): Promise<EnrollmentRecord> {
    const doc = await Enrollment.findByIdAndUpdate(
      id,
      { $set: aggregate },
      { new: true, session: this.session }
    );
    if (!doc) throw new NotFoundError('Enrollment not found');
    return toEnrollment(doc);
  }

  async lock(id: string): Promise<void> {
    await Enrollment.updateOne({ _id: id }, { $inc: { lockVersion: 1 } }, { session: this.session ?? undefined });
  }
}

class MongoLectureProgressRepository implements LectureProgressRepository {
  constructor(private readonly session: ClientSession | null) {}

  async find(enrollmentId: string, lectureId: string): Promise<LectureProgressRecord | null> {
    const doc = await LectureProgress.findOne({ enrollmentId, lectureId }).session(this.session);
    return doc ? toLectureProgress(doc) : null;
  }

  async listByEnrollment(enrollmentId: string): Promise<LectureProgressRecord[]> {
    const docs = await LectureProgress.find({ enrollmentId }).session(this.session);
    return docs.map(toLectureProgress);
  }

  async insert(data: Omit<LectureProgressRecord, 'id'>): Promise<LectureProgressRecord> {
    try {
      const [doc] = await LectureProgress.create([data], { session: this.session });
      return toLectureProgress(doc);
    } catch (error) {
      throw translateDuplicate(error, 'enrollment_lecture_unique');
    }
  }

  async update(id: string, patch: LectureProgressPatch): Promise<LectureProgressRecord> {
    const doc = await LectureProgress.findByIdAndUpdate(
      id,
      { $set: patch },
      { new: true, session: this.session }
    );
    if (!doc) throw new NotFoundError('Lecture progress not found');
    return toLectureProgress(doc);
  }

  async countCompleted(enrollmentId: string, lectureIds: string[]): Promise<number> {
    return LectureProgress.countDocuments({
      enrollmentId,
      lectureId: { $in: lectureIds },
      completed: true,
    }).session(this.session).exec();
  }
}

class MongoCertificateRepository implements CertificateRepository {
  constructor(private readonly session: ClientSession | null) {}

  async findByUserAndCourse(userId: string, courseId: string): Promise<CertificateRecord | null> {
    if (!isValidObjectId(userId) || !isValidObjectId(courseId)) return null;
    const doc = await Certificate.findOne({ userId, courseId }).session(this.session);
    return doc ? toCertificate(doc) : null;
  }

  async findByNumber(certificateNumber: string): Promise<CertificateRecord | null> {
    const doc = await Certificate.findOne({ certificateNumber: certificateNumber.toUpperCase() })
      .session(this.session);
    return doc ? toCertificate(doc) : null;
  }

  async listByUser(userId: string): Promise<CertificateRecord[]> {
    if (!isValidObjectId(userId)) return [];
    const docs = await Certificate.find({ userId }).sort({ issuedAt: -1 }).session(this.session);
    return docs.map(toCertificate);
  }

  async countByUser(userId: string): Promise<number> {
    return Certificate.countDocuments({ userId }).session(this.session).exec();
  }

  async insert(data: Omit<CertificateRecord, 'id'>): Promise<CertificateRecord> {
    try {
      const [doc] = await Certificate.create([data], { session: this.session });
      return toCertificate(doc);
    } catch (error) {
      throw translateDuplicate(error, 'user_course_unique');
    }
  }
}

class MongoBadgeRepository implements BadgeRepository {
  constructor(private readonly session: ClientSession | null) {}

  async insert(data: Omit<BadgeRecord, 'id'>): Promise<BadgeRecord> {
    try {
      const [doc] = await UserBadge.create([data], { session: this.session });
      return toBadge(doc);
    } catch (error) {
      throw translateDuplicate(error, 'user_badge_unique');
    }
  }

  async countByUser(userId: string): Promise<number> {
    return UserBadge.countDocuments({ userId }).session(this.session).exec();
  }
}

class MongoPaymentRepository implements PaymentRepository {
  constructor(private readonly session: ClientSession | null) {}

  async findByTransactionId(transactionId: string): Promise<PaymentRecord | null> {
    const doc = await Payment.findOne({ transactionId }).session(this.session);
    return doc ? toPayment(doc) : null;
  }

  async listByUser(userId: string): Promise<PaymentRecord[]> {
    if (!isValidObjectId(userId)) return [];
    const docs = await Payment.find({ userId }).sort({ createdAt: -1 }).session(this.session);
    return docs.map(toPayment);
  }

  async insert(data: Omit<PaymentRecord, 'id' | 'createdAt' | 'updatedAt'>): Promise<PaymentRecord> {
    try {
      const [doc] = await Payment.create([data], { session: this.session });
      return toPayment(doc);
    } catch (error) {
      throw translateDuplicate(error, 'transaction_id_unique');
    }
  }

  async updateStatus(id: string, status: PaymentStatus, gatewayResponse?: string | null): Promise<PaymentRecord> {
    const doc = await Payment.findByIdAndUpdate(
      id,
      { $set: gatewayResponse === undefined ? { status } : { status, gatewayResponse } },
      { new: true, session: this.session }
    );
    if (!doc) throw new NotFoundError('Payment record not found');
    return toPayment(doc);
  }
}

class MongoEventRepository implements EventRepository {
  constructor(private readonly session: ClientSession | null) {}

  async findById(id: string): Promise<EventRecord | null> {
    if (!isValidObjectId(id)) return null;
    const doc = await Event.findById(id).session(this.session);
    return doc ? toEvent(doc) : null;
  }

  async findManyByIds(ids: string[]): Promise<EventRecord[]> {
    const docs = await Event.find({ _id: { $in: validIds(ids) } }).session(this.session);
    return docs.map(toEvent);
  }

  async search(filter: EventSearch): Promise<EventPage> {
    const query: FilterQuery<IEvent> = {};
    if (filter.text) {
      const pattern = { $regex: escapeRegex(filter.text), $options: 'i' };
      query.$or = [{ title: pattern }, { description: pattern }];
    }
    if (filter.eventType) query.eventType = filter.eventType;
    if (filter.from || filter.until) {
      query.date = {
        ...(filter.from ? { $gte: filter.from } : {}),
        ...(filter.until ? { $lt: filter.until } : {}),
      };
    }

    const [docs, total] = await Promise.all([
      Event.find(query)
        .sort({ date: 1, time: 1 })
        .skip(filter.offset)
        .limit(filter.limit)
        .session(this.session),
      Event.countDocuments(query).session(this.session),
    ]);
    return { items: docs.map(toEvent), total };
  }

  async reserveSeat(eventId: string): Promise<boolean> {
    const result = await Event.updateOne(
      { _id: eventId, $expr: { $lt: ['$registered', '$capacity'] } },
      { $inc: { registered: 1 } },
      { session: this.session ?? undefined }
    );
    return result.modifiedCount === 1;
  }
}

class MongoEventRegistrationRepository implements EventRegistrationRepository {
  constructor(private readonly session: ClientSession | null) {}

  async findByUserAndEvent(userId: string, eventId: string): Promise<EventRegistrationRecord | null> {
    if (!isValidObjectId(userId) || !isValidObjectId(eventId)) return null;
    const doc = await EventRegistration.findOne({ userId, eventId }).session(this.session);
    return doc ? toRegistration(doc) : null;
  }

  async listByUser(userId: string): Promise<EventRegistrationRecord[]> {
    if (!isValidObjectId(userId)) return [];
    const docs = await EventRegistration.find({ userId }).session(this.session);
    return docs.map(toRegistration);
  }

  async insert(data: Omit<EventRegistrationRecord, 'id'>): Promise<EventRegistrationRecord> {
    try {
      const [doc] = await EventRegistration.create([data], { session: this.session });
      return toRegistration(doc);
    } catch (error) {
      throw translateDuplicate(error, 'user_event_unique');
    }
  }
}

const createRepositories = (session: ClientSession | null): Repositories => ({
  users: new MongoUserRepository(session),
  courses: new MongoCourseRepository(session),
  lectures: new MongoLectureRepository(session),
  enrollments: new MongoEnrollmentRepository(session),
  lectureProgress: new MongoLectureProgressRepository(session),
  certificates: new MongoCertificateRepository(session),
  badges: new MongoBadgeRepository(session),
  payments: new MongoPaymentRepository(session),
  events: new MongoEventRepository(session),
  registrations: new MongoEventRegistrationRepository(session),
});

/**
 * Store backed by the default mongoose connection. Transactions need a
 * replica set (or sharded cluster); `withTransaction` retries the callback
 * on TransientTransactionError, which is how two writers racing on one
 * enrollment lock end up serialized.
 */
export const createMongoStore = (): LmsStore => ({
  ...createRepositories(null),

  async transaction<T>(work: (tx: Repositories) => Promise<T>): Promise<T> {
    const session = await mongoose.startSession();
    try {
      return await session.withTransaction(() => work(createRepositories(session)));
    } finally {
      await session.endSession();
    }
  },
});
