// src/stores/announcementStore.ts
import { Announcement, IAnnouncement } from "../models/Announcements";
import { AnnouncementId } from "../utils/announcementId";

export type AnnouncementRecord = IAnnouncement & { _id: AnnouncementId };

export type AnnouncementPatch = Partial<
  Pick<IAnnouncement, "message" | "start_date" | "expiration_date">
>;

export interface AnnouncementQuery {
  expiresOnOrAfter?: string; // yyyy-MM-dd, inclusive
  sortByCreatedAt?: "asc" | "desc";
}

export interface AnnouncementStore {
  find(query?: AnnouncementQuery): Promise<AnnouncementRecord[]>;
  findOne(id: AnnouncementId): Promise<AnnouncementRecord | null>;
  insert(doc: IAnnouncement): Promise<AnnouncementId>;
  updateOne(id: AnnouncementId, patch: AnnouncementPatch): Promise<number>; // matched count
  deleteOne(id: AnnouncementId): Promise<number>; // deleted count
}

export const createMongoAnnouncementStore = (): AnnouncementStore => ({
  async find({ expiresOnOrAfter, sortByCreatedAt } = {}) {
    const filter = expiresOnOrAfter ? { expiration_date: { $gte: expiresOnOrAfter } } : {};
    const sort: Record<string, 1 | -1> = sortByCreatedAt
      ? { created_at: sortByCreatedAt === "desc" ? -1 : 1 }
      : {};

    return Announcement.find(filter).sort(sort).lean<AnnouncementRecord[]>();
  },

  async findOne(id) {
    return Announcement.findById(id).lean<AnnouncementRecord>();
  },

  async insert(doc) {
    const saved = await new Announcement(doc).save();
    return saved._id;
  },

  async updateOne(id, patch) {
    const result = await Announcement.updateOne({ _id: id }, { $set: patch });
    return result.matchedCount;
  },

  async deleteOne(id) {
    const result = await Announcement.deleteOne({ _id: id });
    return result.deletedCount;
  },
});
