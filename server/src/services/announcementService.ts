// src/services/announcementService.ts
import { AnnouncementPatch, AnnouncementRecord, AnnouncementStore } from "../stores/announcementStore";
import { TeacherDirectory } from "../stores/teacherDirectory";
import { parseAnnouncementId, stringifyAnnouncementId } from "../utils/announcementId";
import { isActiveOn, todayString } from "../utils/dates";
import { InvalidRequestError, NotFoundError, UnauthorizedError } from "../utils/errors";

export interface AnnouncementView {
  _id: string;
  message: string;
  start_date: string | null;
  expiration_date: string;
  created_by: string;
  created_at: string;
}

export interface CreateAnnouncementInput {
  message: string;
  start_date?: string | null;
  expiration_date: string;
  created_by: string;
}

export interface UpdateAnnouncementInput {
  message?: string | null;
  start_date?: string | null;
  expiration_date?: string | null;
}

export interface AnnouncementServiceDeps {
  teachers: TeacherDirectory;
  announcements: AnnouncementStore;
  now?: () => Date;
}

const toView = (doc: AnnouncementRecord): AnnouncementView => ({
  _id: stringifyAnnouncementId(doc._id),
  message: doc.message,
  start_date: doc.start_date ?? null,
  expiration_date: doc.expiration_date,
  created_by: doc.created_by,
  created_at: doc.created_at,
});

// null and undefined both mean "leave as is"
const buildPatch = (input: UpdateAnnouncementInput): AnnouncementPatch => {
  const patch: AnnouncementPatch = {};
  if (input.message != null) patch.message = input.message;
  if (input.start_date != null) patch.start_date = input.start_date;
  if (input.expiration_date != null) patch.expiration_date = input.expiration_date;
  return patch;
};

export const createAnnouncementService = ({
  teachers,
  announcements,
  now = () => new Date(),
}: AnnouncementServiceDeps) => {
  const requireTeacher = async (username: string) => {
    const teacher = await teachers.findByUsername(username);
    if (!teacher) throw new UnauthorizedError();
    return teacher;
  };

  return {
    async listActive(): Promise<AnnouncementView[]> {
      const today = todayString(now());
      const candidates = await announcements.find({ expiresOnOrAfter: today });
      return candidates.filter((a) => isActiveOn(a, today)).map(toView);
    },

    async listAll(callerUsername: string): Promise<AnnouncementView[]> {
      await requireTeacher(callerUsername);
      const all = await announcements.find({ sortByCreatedAt: "desc" });
      return all.map(toView);
    },

    // Dates are stored verbatim; neither their format nor their order is checked.
    async create(input: CreateAnnouncementInput): Promise<AnnouncementView> {
      await requireTeacher(input.created_by);

      const doc = {
        message: input.message,
        start_date: input.start_date ?? null,
        expiration_date: input.expiration_date,
        created_by: input.created_by,
        created_at: now().toISOString(),
      };
      const _id = await announcements.insert(doc);

      return toView({ ...doc, _id });
    },

    async update(
      rawId: string,
      callerUsername: string,
      input: UpdateAnnouncementInput
    ): Promise<AnnouncementView> {
      await requireTeacher(callerUsername);

      const patch = buildPatch(input);
      if (Object.keys(patch).length === 0) {
        throw new InvalidRequestError("No fields to update");
      }

      const id = parseAnnouncementId(rawId);
      const matched = await announcements.updateOne(id, patch);
      if (matched === 0) throw new NotFoundError();

      // Deleted between the two calls
      const updated = await announcements.findOne(id);
      if (!updated) throw new NotFoundError();

      return toView(updated);
    },

    async delete(rawId: string, callerUsername: string): Promise<{ message: string }> {
      await requireTeacher(callerUsername);

      const id = parseAnnouncementId(rawId);
      const deleted = await announcements.deleteOne(id);
      if (deleted === 0) throw new NotFoundError();

      return { message: "Announcement deleted successfully" };
    },
  };
};

export type AnnouncementService = ReturnType<typeof createAnnouncementService>;
