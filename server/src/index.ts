import mongoose from "mongoose";
import { createServer } from "http";
import { Server } from "socket.io";

import { config } from "./config";
import { createApp } from "./app";
import { createAnnouncementService } from "./services/announcementService";
import { createMongoAnnouncementStore } from "./stores/announcementStore";
import { createMongoTeacherDirectory } from "./stores/teacherDirectory";
import { initSocket } from "./socket";

const service = createAnnouncementService({
  teachers: createMongoTeacherDirectory(),
  announcements: createMongoAnnouncementStore(),
});

const app = createApp(service, config.corsOrigin);
const httpServer = createServer(app);

// Setup socket.io
const io = new Server(httpServer, {
  cors: {
    origin: config.corsOrigin,
  },
});

// Socket setup does not wait for Mongo
initSocket(io);

// Connect DB
mongoose
  .connect(config.mongoUri)
  .then(() => console.log("✅ MongoDB connected"))
  .catch((err) => console.error("❌ MongoDB connection error:", err));

// Start server
httpServer.listen(config.port, () => {
  console.log(`🚀 Server running on port ${config.port}`);
});
