/// src/models/Announcements.ts
import mongoose, { Schema } from "mongoose";

export interface IAnnouncement {
  message: string;
  start_date: string | null; // yyyy-MM-dd, null = already started
  expiration_date: string; // yyyy-MM-dd
  created_by: string; // FK -> Teacher._id (checked on insert only)
  created_at: string; // ISO-8601
}

const AnnouncementSchema: Schema = new Schema<IAnnouncement>(
  {
    message: { type: String, required: true },
    start_date: { type: String, default: null },
    expiration_date: { type: String, required: true },
    created_by: { type: String, required: true, ref: "Teacher" },
    created_at: { type: String, required: true },
  },
  { versionKey: false }
  // no timestamps, created_at is stamped by the service
);

export const Announcement = mongoose.model<IAnnouncement>(
  "Announcement",
  AnnouncementSchema,
  "announcements"
);
