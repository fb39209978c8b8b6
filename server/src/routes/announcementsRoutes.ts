import { Router } from "express";
import { createAnnouncementsController } from "../controllers/announcementsController";
import { AnnouncementService } from "../services/announcementService";

export const createAnnouncementRoutes = (service: AnnouncementService) => {
  const router = Router();
  const {
    getActiveAnnouncements,
    getAllAnnouncements,
    createAnnouncement,
    updateAnnouncement,
    deleteAnnouncement,
  } = createAnnouncementsController(service);

  // Active announcements, no credentials needed
  router.get("/active", getActiveAnnouncements);

  // Every announcement, newest first (username query param)
  router.get("/all", getAllAnnouncements);

  // Create announcement (created_by in body)
  router.post("/", createAnnouncement);

  // Update announcement by _id (username query param)
  router.put("/:id", updateAnnouncement);

  // Delete announcement by _id (username query param)
  router.delete("/:id", deleteAnnouncement);

  return router;
};
