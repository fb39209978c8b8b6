import { Request, Response } from "express";
import { AnnouncementService } from "../services/announcementService";
import { AnnouncementServiceError } from "../utils/errors";
import { parseAnnouncementId, stringifyAnnouncementId } from "../utils/announcementId";
import { emitAnnouncementsUpdated } from "../utils/socketEmitter";

const sendError = (res: Response, action: string, err: unknown) => {
  if (err instanceof AnnouncementServiceError) {
    return res.status(err.statusCode).json({ error: err.message });
  }
  console.error(`Error ${action}:`, err);
  const message = err instanceof Error ? err.message : String(err);
  return res.status(500).json({ message: "Server error", error: message });
};

const readUsername = (req: Request): string | undefined => {
  const { username } = req.query;
  return typeof username === "string" && username ? username : undefined;
};

// undefined/null pass through, anything else must be a string
const isOptionalString = (value: unknown): value is string | null | undefined =>
  value === undefined || value === null || typeof value === "string";

export const createAnnouncementsController = (service: AnnouncementService) => {
  // GET /announcements/active
  const getActiveAnnouncements = async (req: Request, res: Response) => {
    try {
      const announcements = await service.listActive();
      return res.status(200).json(announcements);
    } catch (err) {
      return sendError(res, "fetching active announcements", err);
    }
  };

  // GET /announcements/all?username=
  const getAllAnnouncements = async (req: Request, res: Response) => {
    try {
      const username = readUsername(req);
      if (!username) {
        return res.status(400).json({ error: "username query is required" });
      }

      const announcements = await service.listAll(username);
      return res.status(200).json(announcements);
    } catch (err) {
      return sendError(res, "fetching announcements", err);
    }
  };

  // POST /announcements
  const createAnnouncement = async (req: Request, res: Response) => {
    try {
      const { message, start_date, expiration_date, created_by } = req.body ?? {};

      if (
        typeof message !== "string" ||
        typeof expiration_date !== "string" ||
        typeof created_by !== "string"
      ) {
        return res
          .status(400)
          .json({ error: "message, expiration_date and created_by are required" });
      }
      if (!isOptionalString(start_date)) {
        return res.status(400).json({ error: "start_date must be a string" });
      }

      const announcement = await service.create({
        message,
        start_date,
        expiration_date,
        created_by,
      });
      emitAnnouncementsUpdated({ operation: "create", _id: announcement._id });

      return res.status(200).json(announcement);
    } catch (err) {
      return sendError(res, "creating announcement", err);
    }
  };

  // PUT /announcements/:id?username=
  const updateAnnouncement = async (req: Request, res: Response) => {
    try {
      const { id } = req.params;
      const username = readUsername(req);
      if (!username) {
        return res.status(400).json({ error: "username query is required" });
      }

      const { message, start_date, expiration_date } = req.body ?? {};
      if (
        !isOptionalString(message) ||
        !isOptionalString(start_date) ||
        !isOptionalString(expiration_date)
      ) {
        return res
          .status(400)
          .json({ error: "message, start_date and expiration_date must be strings" });
      }

      const announcement = await service.update(id, username, {
        message,
        start_date,
        expiration_date,
      });
      emitAnnouncementsUpdated({ operation: "update", _id: announcement._id });

      return res.status(200).json(announcement);
    } catch (err) {
      return sendError(res, "updating announcement", err);
    }
  };

  // DELETE /announcements/:id?username=
  const deleteAnnouncement = async (req: Request, res: Response) => {
    try {
      const { id } = req.params;
      const username = readUsername(req);
      if (!username) {
        return res.status(400).json({ error: "username query is required" });
      }

      const result = await service.delete(id, username);
      // same casing as the ids create/update hand out
      emitAnnouncementsUpdated({
        operation: "delete",
        _id: stringifyAnnouncementId(parseAnnouncementId(id)),
      });

      return res.status(200).json(result);
    } catch (err) {
      return sendError(res, "deleting announcement", err);
    }
  };

  return {
    getActiveAnnouncements,
    getAllAnnouncements,
    createAnnouncement,
    updateAnnouncement,
    deleteAnnouncement,
  };
};
