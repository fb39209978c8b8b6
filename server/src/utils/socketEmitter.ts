import type { Server } from 'socket.io';

export const ANNOUNCEMENTS_UPDATED = 'announcementsUpdated';

export type AnnouncementChange = {
  operation: 'create' | 'update' | 'delete';
  _id: string; // lower-case hex, as returned by the API
};

let ioInstance: Server | null = null;

export function registerSocketServer(io: Server | null) {
  ioInstance = io;
}

// Best effort: a missing or failing socket server never fails the request
export function emitAnnouncementsUpdated(change: AnnouncementChange) {
  try {
    if (ioInstance) {
      ioInstance.emit(ANNOUNCEMENTS_UPDATED, change);
    }
  } catch (err) {
    console.error('Error emitting', ANNOUNCEMENTS_UPDATED, err);
  }
}
