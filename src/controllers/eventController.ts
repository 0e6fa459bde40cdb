import { Request, Response } from "express";
import { asyncHandler } from "../middlewares/asyncHandler";
import { AuthRequest, requireUser } from "../middlewares/auth";
import { ApiResponse } from "../utils/ApiResponse";
import { EventType } from "../models/Event";
import { optionalNumber, optionalString } from "../utils/requestBody";
import type { EventService } from "../services/eventService";

const eventTypes: readonly string[] = Object.values(EventType);
const isEventType = (value: string | undefined): value is EventType =>
  value !== undefined && eventTypes.includes(value);

export const createEventController = (events: EventService) => ({
  // ==============================
  // PUBLIC CATALOGUE
  // ==============================
  listEvents: asyncHandler(async (req: Request, res: Response) => {
    const eventType = optionalString(req.query, "eventType");
    const page = await events.list({
      search: optionalString(req.query, "search"),
      eventType: isEventType(eventType) ? eventType : undefined,
      dateFrom: optionalString(req.query, "dateFrom"),
      dateTo: optionalString(req.query, "dateTo"),
      limit: optionalNumber(req.query, "limit"),
      offset: optionalNumber(req.query, "offset"),
    });
    res.status(200).json(ApiResponse.page(page.data, page.total, page.limit, page.offset));
  }),

  getEvent: asyncHandler(async (req: Request, res: Response) => {
    res.status(200).json(ApiResponse.success(await events.detail(req.params.eventId)));
  }),

  // ==============================
  // REGISTRATION
  // ==============================
  rsvp: asyncHandler(async (req: AuthRequest, res: Response) => {
    const user = requireUser(req);
    const result = await events.rsvp(user.userId, req.params.eventId);
    res.status(201).json(ApiResponse.success(result, "Successfully registered for event", 201));
  }),

  getMySchedule: asyncHandler(async (req: AuthRequest, res: Response) => {
    const user = requireUser(req);
    res.status(200).json(ApiResponse.list(await events.mySchedule(user.userId)));
  }),

  downloadCalendar: asyncHandler(async (req: Request, res: Response) => {
    const file = await events.calendar(req.params.eventId);
    res.setHeader("Content-Type", "text/calendar; charset=utf-8");
    res.setHeader("Content-Disposition", `attachment; filename="${file.filename}"`);
    res.status(200).send(file.content);
  }),
});

export type EventController = ReturnType<typeof createEventController>;
