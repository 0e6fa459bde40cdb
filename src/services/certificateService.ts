// ============================================
// src/services/certificateService.ts
// ============================================

import { randomInt } from 'crypto';
import type { LRUCache } from 'lru-cache';
import type { CertificateRecord, LmsStore } from '../repositories/types';
import {
  ConflictError,
  DuplicateKeyError,
  NotFoundError,
  PreconditionFailedError,
  errorMessage,
} from '../utils/errors';
import { createCache } from '../utils/cache';
import { Logger } from '../utils/loggers';
import { Notifier, runInBackground } from './whatsappService';

const NUMBER_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';
const NUMBER_SUFFIX_LENGTH = 6;
const MAX_NUMBER_ATTEMPTS = 5;

export const FIRST_COURSE_BADGE = {
  name: 'First Course Complete',
  description: 'Completed your first course',
  icon: 'trophy',
} as const;

export interface IssuedCertificate {
  certificateId: string;
  certificateUrl: string;
  certificateNumber: string;
  alreadyIssued: boolean;
}

export interface CertificateVerification {
  valid: true;
  certificateNumber: string;
  userName: string;
  courseTitle: string;
  issuedAt: string;
}

export interface CertificateSummary {
  certificateId: string;
  certificateNumber: string;
  certificateUrl: string;
  courseId: string;
  courseTitle: string;
  courseImage: string | null;
  issuedAt: string;
}

/** `CERT-<UTC YYYYMMDD>-<6 chars of A-Z0-9>` */
export const generateCertificateNumber = (
  date: Date,
  random: (max: number) => number = randomInt
): string => {
  const stamp = date.toISOString().slice(0, 10).replace(/-/g, '');
  let suffix = '';
  for (let i = 0; i < NUMBER_SUFFIX_LENGTH; i++) {
    suffix += NUMBER_ALPHABET[random(NUMBER_ALPHABET.length)];
  }
  return `CERT-${stamp}-${suffix}`;
};

interface CertificateServiceOptions {
  certificateBaseUrl: string;
  now?: () => Date;
  /** Index source for the number suffix. */
  random?: (max: number) => number;
  verificationCache?: LRUCache<string, CertificateVerification>;
}

export class CertificateService {
  private readonly now: () => Date;
  private readonly cache: LRUCache<string, CertificateVerification>;

  constructor(
    private readonly store: LmsStore,
    private readonly notifier: Notifier,
    private readonly options: CertificateServiceOptions
  ) {
    this.now = options.now ?? (() => new Date());
    this.cache = options.verificationCache ?? createCache<CertificateVerification>();
  }

  async issue(userId: string, courseId: string): Promise<IssuedCertificate> {
    const enrollment = await this.store.enrollments.findByUserAndCourse(userId, courseId);
    if (!enrollment) throw new NotFoundError('Enrollment not found');
    if (!enrollment.completed) {
      throw new PreconditionFailedError('Course must be completed to generate certificate');
    }

    const existing = await this.store.certificates.findByUserAndCourse(userId, courseId);
    if (existing) return toIssued(existing, true);

    const certificate = await this.insertWithUniqueNumber(userId, courseId);
    if (certificate.alreadyIssued) return certificate;

    Logger.success('Certificate issued', { userId, courseId, number: certificate.certificateNumber });

    runInBackground('Certificate notification', () =>
      this.notify(userId, courseId, certificate.certificateUrl)
    );
    await this.awardFirstCourseBadge(userId);

    return certificate;
  }

  async verify(certificateNumber: string): Promise<CertificateVerification> {
    const key = certificateNumber.trim().toUpperCase();
    const cached = this.cache.get(key);
    if (cached) return cached;

    const certificate = await this.store.certificates.findByNumber(key);
    if (!certificate) throw new NotFoundError('Certificate not found');

    const [user, course] = await Promise.all([
      this.store.users.findById(certificate.userId),
      this.store.courses.findById(certificate.courseId),
    ]);

    const verification: CertificateVerification = {
      valid: true,
      certificateNumber: certificate.certificateNumber,
      userName: user?.name ?? 'Unknown',
      courseTitle: course?.title ?? 'Unknown Course',
      issuedAt: certificate.issuedAt.toISOString(),
    };
    this.cache.set(key, verification);
    return verification;
  }

  async listForUser(userId: string): Promise<CertificateSummary[]> {
    const certificates = await this.store.certificates.listByUser(userId);
    const courses = await this.store.courses.findManyByIds(certificates.map((c) => c.courseId));
    const courseById = new Map(courses.map((c) => [c.id, c]));

    return certificates
      .slice()
      .sort((a, b) => b.issuedAt.getTime() - a.issuedAt.getTime())
      .map((certificate) => {
        const course = courseById.get(certificate.courseId);
        return {
          certificateId: certificate.id,
          certificateNumber: certificate.certificateNumber,
          certificateUrl: certificate.certificateUrl,
          courseId: certificate.courseId,
          courseTitle: course?.title ?? 'Unknown Course',
          courseImage: course?.image ?? null,
          issuedAt: certificate.issuedAt.toISOString(),
        };
      });
  }

  private async insertWithUniqueNumber(userId: string, courseId: string): Promise<IssuedCertificate> {
    const issuedAt = this.now();

    for (let attempt = 1; attempt <= MAX_NUMBER_ATTEMPTS; attempt++) {
      const certificateNumber = generateCertificateNumber(issuedAt, this.options.random);
      try {
        const certificate = await this.store.certificates.insert({
          userId,
          courseId,
          certificateNumber,
          certificateUrl: `${this.options.certificateBaseUrl}/${certificateNumber}.pdf`,
          issuedAt,
        });
        return toIssued(certificate, false);
      } catch (error) {
        if (!(error instanceof DuplicateKeyError)) throw error;

        if (error.index !== 'certificate_number_unique') {
          // a concurrent request issued it first
          const winner = await this.store.certificates.findByUserAndCourse(userId, courseId);
          if (winner) return toIssued(winner, true);
          throw error;
        }
        Logger.warning('Certificate number collision, regenerating', { certificateNumber, attempt });
      }
    }

    throw new ConflictError('Could not allocate a unique certificate number', 'CERTIFICATE_NUMBER_EXHAUSTED');
  }

  // Called after a fresh insert, so the user holds at least one certificate.
  // The (userId, name) unique index keeps concurrent first issues to one badge.
  private async awardFirstCourseBadge(userId: string): Promise<void> {
    try {
      await this.store.badges.insert({ userId, ...FIRST_COURSE_BADGE, awardedAt: this.now() });
      Logger.info('Badge awarded', { userId, badge: FIRST_COURSE_BADGE.name });
    } catch (error) {
      if (error instanceof DuplicateKeyError) {
        Logger.debug('Badge already awarded', { userId });
        return;
      }
      Logger.error('Badge award failed', errorMessage(error));
    }
  }

  private async notify(userId: string, courseId: string, certificateUrl: string): Promise<void> {
    const [user, course] = await Promise.all([
      this.store.users.findById(userId),
      this.store.courses.findById(courseId),
    ]);
    if (!user?.phone) {
      Logger.debug('No phone on file, skipping certificate message', { userId });
      return;
    }

    await this.notifier.send(user.phone, 'certificate', {
      userName: user.name,
      courseTitle: course?.title ?? 'your course',
      certificateUrl,
    });
  }
}

const toIssued = (certificate: CertificateRecord, alreadyIssued: boolean): IssuedCertificate => ({
  certificateId: certificate.id,
  certificateUrl: certificate.certificateUrl,
  certificateNumber: certificate.certificateNumber,
  alreadyIssued,
});
