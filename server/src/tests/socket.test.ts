import type { Server } from "socket.io";
import { initSocket } from "../socket";
import { emitAnnouncementsUpdated, registerSocketServer } from "../utils/socketEmitter";

describe("initSocket", () => {
  afterEach(() => {
    registerSocketServer(null);
  });

  it("registers the server for announcement broadcasts on its own", () => {
    const io = { on: jest.fn(), emit: jest.fn() };

    initSocket(io as unknown as Server);
    emitAnnouncementsUpdated({ operation: "create", _id: "65f1a2b3c4d5e6f708192a3b" });

    expect(io.on).toHaveBeenCalledWith("connection", expect.any(Function));
    expect(io.emit).toHaveBeenCalledWith("announcementsUpdated", {
      operation: "create",
      _id: "65f1a2b3c4d5e6f708192a3b",
    });
  });

  it("drops broadcasts when no server is registered", () => {
    expect(() =>
      emitAnnouncementsUpdated({ operation: "delete", _id: "65f1a2b3c4d5e6f708192a3b" })
    ).not.toThrow();
  });

  it("logs instead of throwing when the emit fails", () => {
    const consoleError = jest.spyOn(console, "error").mockImplementation(() => undefined);
    const failure = new Error("transport closed");
    registerSocketServer({
      emit: () => {
        throw failure;
      },
    } as unknown as Server);

    emitAnnouncementsUpdated({ operation: "update", _id: "65f1a2b3c4d5e6f708192a3b" });

    expect(consoleError).toHaveBeenCalledWith("Error emitting", "announcementsUpdated", failure);
    consoleError.mockRestore();
  });
});
