import { Server, Socket } from "socket.io";
import { registerSocketServer } from "./utils/socketEmitter";

// Dashboards listen for ANNOUNCEMENTS_UPDATED and refetch /announcements/active
export function initSocket(io: Server) {
  registerSocketServer(io);

  io.on("connection", (socket: Socket) => {
    console.log("✅ Client connected:", socket.id);
    socket.on("disconnect", () => {
      console.log("❌ Client disconnected:", socket.id);
    });
  });
}
