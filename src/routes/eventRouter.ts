import express from "express";
import { protect } from "../middlewares/auth";
import { eventValidation } from "../middlewares/validation";
import type { EventController } from "../controllers/eventController";

export const createEventRouter = (controller: EventController) => {
  const eventRouter = express.Router();

  // ============================================
  // PUBLIC ROUTES
  // ============================================
  eventRouter.get("/", eventValidation.list, controller.listEvents);
  // calendar apps fetch this without a bearer token
  eventRouter.get("/:eventId/calendar", eventValidation.byId, controller.downloadCalendar);

  // ============================================
  // STUDENT ROUTES
  // ============================================
  // before /:eventId so it is not read as an id
  eventRouter.get("/my-schedule", protect, controller.getMySchedule);
  eventRouter.post("/:eventId/rsvp", protect, eventValidation.byId, controller.rsvp);

  eventRouter.get("/:eventId", eventValidation.byId, controller.getEvent);

  return eventRouter;
};
