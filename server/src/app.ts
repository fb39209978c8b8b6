import express, { Application, Request, Response } from "express";
import cors from "cors";

import { createAnnouncementRoutes } from "./routes/announcementsRoutes";
import { AnnouncementService } from "./services/announcementService";

export const createApp = (service: AnnouncementService, corsOrigin = "*"): Application => {
  const app: Application = express();

  // Middleware
  app.use(cors({ origin: corsOrigin }));
  app.use(express.json());

  // Routes
  const announcementRoutes = createAnnouncementRoutes(service);
  app.use("/announcements", announcementRoutes);
  app.use("/api/announcements", announcementRoutes);

  // Test route
  app.get("/", (req: Request, res: Response) => {
    res.send("API is running...");
  });

  return app;
};
