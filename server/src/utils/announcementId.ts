// src/utils/announcementId.ts
import { Types } from "mongoose";
import { InvalidArgumentError } from "./errors";

export type AnnouncementId = Types.ObjectId;

// 24 hex chars, the only form Mongo generates for announcements
const OBJECT_ID_PATTERN = /^[a-f\d]{24}$/i;

export const parseAnnouncementId = (raw: string): AnnouncementId => {
  if (!OBJECT_ID_PATTERN.test(raw)) {
    throw new InvalidArgumentError(`Invalid announcement ID: ${raw}`);
  }
  return new Types.ObjectId(raw);
};

export const stringifyAnnouncementId = (id: AnnouncementId): string => id.toHexString();
