import { describe, it, expect, beforeAll, afterAll, beforeEach, vi } from 'vitest';
import type { Server } from 'http';
import jwt from 'jsonwebtoken';
import { createApp, AppServices } from '../../src/app';
import { EnrollmentLedger } from '../../src/services/enrollmentLedger';
import { LectureProgressService } from '../../src/services/lectureProgressService';
import { CertificateService } from '../../src/services/certificateService';
import { PaymentService } from '../../src/services/paymentService';
import { EventService } from '../../src/services/eventService';
import { UserRole } from '../../src/models/user';
import { EventType } from '../../src/models/Event';
import type { UserRecord } from '../../src/repositories/types';
import { MemoryStore } from '../support/memoryStore';
import { createFakeGateway, createFakeNotifier } from '../support/fakes';

let store: MemoryStore;
let services: AppServices;
let server: Server;
let baseUrl: string;

const tokenFor = (user: UserRecord, role: UserRole = UserRole.STUDENT): string =>
  jwt.sign({ id: user.id, role, email: user.email, phone: user.phone, name: user.name }, 'test-secret');

const request = async (method: string, path: string, options: { token?: string; body?: string } = {}) => {
  const headers: Record<string, string> = {};
  if (options.token) headers.Authorization = `Bearer ${options.token}`;
  if (options.body !== undefined) headers['Content-Type'] = 'application/json';

  const res = await fetch(`${baseUrl}${path}`, { method, headers, body: options.body });
  const text = await res.text();
  const json: unknown = res.headers.get('content-type')?.includes('application/json') ? JSON.parse(text) : null;
  return { status: res.status, text, json, contentType: res.headers.get('content-type') };
};

beforeAll(async () => {
  store = new MemoryStore();
  const { notifier } = createFakeNotifier();
  const ledger = new EnrollmentLedger(store);
  services = {
    ledger,
    progress: new LectureProgressService(store, ledger),
    certificates: new CertificateService(store, notifier, { certificateBaseUrl: 'https://certs.example.com' }),
    payments: new PaymentService(store, ledger, createFakeGateway().gateway, notifier, {
      currency: 'INR',
      gatewayTimeoutMs: 100,
      dashboardUrl: 'https://app.example.com/dashboard',
    }),
    events: new EventService(store, notifier),
  };

  server = createApp(services).listen(0, '127.0.0.1');
  await new Promise<void>((resolve) => server.once('listening', () => resolve()));
  const address = server.address();
  if (address === null || typeof address === 'string') throw new Error('Server did not bind a port');
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
});

describe('HTTP surface', () => {
  let student: UserRecord;

  beforeEach(() => {
    student = store.addUser();
  });

  it('reports health', async () => {
    const res = await request('GET', '/health');
    expect(res.status).toBe(200);
    expect(res.json).toMatchObject({ success: true, message: 'Server is healthy' });
  });

  it('rejects requests without a token', async () => {
    const res = await request('GET', '/api/v1/enrollments/me');
    expect(res.status).toBe(401);
    expect(res.json).toMatchObject({ success: false, code: 'UNAUTHORIZED', error: 'Not authorized' });
  });

  it('rejects a token signed with another secret', async () => {
    const forged = jwt.sign({ id: student.id, role: UserRole.STUDENT }, 'other-secret');
    const res = await request('GET', '/api/v1/enrollments/me', { token: forged });
    expect(res.status).toBe(401);
  });

  it('validates route params', async () => {
    const res = await request('POST', '/api/v1/progress/lectures/not-an-id', {
      token: tokenFor(student),
      body: JSON.stringify({ completed: true }),
    });
    expect(res.status).toBe(400);
    expect(res.json).toMatchObject({
      code: 'VALIDATION_ERROR',
      error: 'Invalid lecture ID',
      details: [{ field: 'lectureId', message: 'Invalid lecture ID' }],
    });
  });

  it('validates body fields', async () => {
    const course = store.addCourse();
    const [lecture] = store.addLectures(course.id, 1);
    store.addEnrollment(student.id, course.id);

    const res = await request('POST', `/api/v1/progress/lectures/${lecture.id}`, {
      token: tokenFor(student),
      body: JSON.stringify({ completed: 'yes' }),
    });

    expect(res.status).toBe(400);
    expect(res.json).toMatchObject({ code: 'VALIDATION_ERROR', error: 'completed must be a boolean' });
  });

  it('completes a course, issues a certificate and verifies it publicly', async () => {
    const course = store.addCourse({ title: 'One Lecture Course' });
    const [lecture] = store.addLectures(course.id, 1);
    store.addEnrollment(student.id, course.id);
    const token = tokenFor(student);

    const progress = await request('POST', `/api/v1/progress/lectures/${lecture.id}`, {
      token,
      body: JSON.stringify({ completed: true, watchedDuration: 600 }),
    });
    expect(progress.status).toBe(200);
    expect(progress.json).toMatchObject({ data: { overallProgress: 100, courseCompleted: true } });

    const generated = await request('POST', `/api/v1/certificates/generate/${course.id}`, { token });
    expect(generated.status).toBe(201);
    const number = store.snapshot().certificates.find((c) => c.userId === student.id)?.certificateNumber;
    expect(generated.json).toMatchObject({ data: { certificateNumber: number, alreadyIssued: false } });

    const again = await request('POST', `/api/v1/certificates/generate/${course.id}`, { token });
    expect(again.status).toBe(200);
    expect(again.json).toMatchObject({ data: { certificateNumber: number, alreadyIssued: true } });

    const verified = await request('GET', `/api/v1/certificates/verify/${number}`);
    expect(verified.status).toBe(200);
    expect(verified.json).toMatchObject({
      data: { valid: true, certificateNumber: number, courseTitle: 'One Lecture Course', userName: student.name },
    });
  });

  it('forbids progress on a course without enrollment', async () => {
    const course = store.addCourse();
    const [lecture] = store.addLectures(course.id, 1);

    const res = await request('POST', `/api/v1/progress/lectures/${lecture.id}`, {
      token: tokenFor(student),
      body: JSON.stringify({ completed: true }),
    });

    expect(res.status).toBe(403);
    expect(res.json).toMatchObject({ code: 'FORBIDDEN', error: 'Not enrolled in this course' });
  });

  it('restricts the enrollment grant to admins', async () => {
    const course = store.addCourse();
    const admin = store.addUser({ role: UserRole.ADMIN });
    const body = JSON.stringify({ userId: student.id, courseId: course.id });

    const denied = await request('POST', '/api/v1/enrollments', { token: tokenFor(student), body });
    expect(denied.status).toBe(403);

    const granted = await request('POST', '/api/v1/enrollments', { token: tokenFor(admin, UserRole.ADMIN), body });
    expect(granted.status).toBe(201);
    expect(granted.json).toMatchObject({ data: { userId: student.id, courseId: course.id } });

    const duplicate = await request('POST', '/api/v1/enrollments', { token: tokenFor(admin, UserRole.ADMIN), body });
    expect(duplicate.status).toBe(409);
    expect(duplicate.json).toMatchObject({ code: 'ALREADY_ENROLLED' });
  });

  it('serves an event calendar file without a token', async () => {
    const event = store.addEvent({ title: 'Demo Day' });
    const res = await request('GET', `/api/v1/events/${event.id}/calendar`);

    expect(res.status).toBe(200);
    expect(res.contentType).toBe('text/calendar; charset=utf-8');
    expect(res.text.split('\r\n')).toContain('SUMMARY:Demo Day');
  });

  it('lists events publicly with filters and paging', async () => {
    store.addEvent({ title: 'Robotics Workshop', eventType: EventType.WORKSHOP, date: new Date('2025-04-02T00:00:00Z') });
    store.addEvent({ title: 'Robotics Webinar', eventType: EventType.WEBINAR, date: new Date('2025-04-01T00:00:00Z') });
    store.addEvent({ title: 'Robotics Lab', eventType: EventType.WORKSHOP, date: new Date('2025-04-01T00:00:00Z') });

    const res = await request('GET', '/api/v1/events?search=robotics&eventType=workshop&limit=1');

    expect(res.status).toBe(200);
    expect(res.json).toMatchObject({ success: true, count: 1, total: 2, limit: 1, offset: 0 });
    expect(res.json).toMatchObject({ data: [{ title: 'Robotics Lab', eventType: 'workshop' }] });
  });

  it('validates event list query parameters', async () => {
    const res = await request('GET', '/api/v1/events?limit=500');
    expect(res.status).toBe(400);
    expect(res.json).toMatchObject({ code: 'VALIDATION_ERROR', error: 'Limit must be between 1 and 100' });
  });

  it('shows event details publicly', async () => {
    const event = store.addEvent({ title: 'Open House', capacity: 5, registered: 2 });
    const res = await request('GET', `/api/v1/events/${event.id}`);
    expect(res.status).toBe(200);
    expect(res.json).toMatchObject({ data: { id: event.id, title: 'Open House', spotsLeft: 3 } });
  });

  it('keeps the personal schedule behind a token', async () => {
    const res = await request('GET', '/api/v1/events/my-schedule');
    expect(res.status).toBe(401);
  });

  it('answers unknown routes with 404', async () => {
    const res = await request('GET', '/api/v1/nope');
    expect(res.status).toBe(404);
    expect(res.json).toMatchObject({ code: 'NOT_FOUND', error: 'Not Found - /api/v1/nope' });
  });

  it('rejects malformed JSON', async () => {
    const res = await request('POST', '/api/v1/payments/create', { token: tokenFor(student), body: '{"courseId":' });
    expect(res.status).toBe(400);
    expect(res.json).toMatchObject({ success: false, code: 'BAD_REQUEST' });
  });

  it('hides unexpected error messages', async () => {
    vi.spyOn(services.ledger, 'overview').mockRejectedValueOnce(new Error('database exploded'));

    const res = await request('GET', '/api/v1/enrollments/overview', { token: tokenFor(student) });

    expect(res.status).toBe(500);
    expect(res.json).toMatchObject({ success: false, code: 'INTERNAL_ERROR', error: 'Server error' });
  });
});
