import { describe, expect, it } from "vitest";
import { TransactionClient, withTransaction } from "../src/infra/db/postgres.js";

class RecordingClient implements TransactionClient {
  readonly statements: string[] = [];
  readonly releases: Array<Error | boolean | undefined> = [];

  constructor(private readonly failing: Record<string, Error> = {}) {}

  async query(text: string): Promise<unknown> {
    this.statements.push(text);
    const failure = this.failing[text];
    if (failure) {
      throw failure;
    }
    return { rowCount: 0 };
  }

  release(error?: Error | boolean): void {
    this.releases.push(error);
  }
}

describe("withTransaction", () => {
  it("commits and returns the connection to the pool", async () => {
    const client = new RecordingClient();

    const result = await withTransaction(async () => client, async (db) => {
      await db.query("DELETE FROM chunks");
      return 7;
    });

    expect(result).toBe(7);
    expect(client.statements).toEqual(["BEGIN", "DELETE FROM chunks", "COMMIT"]);
    expect(client.releases).toEqual([undefined]);
  });

  it("rolls back and rethrows the failure", async () => {
    const client = new RecordingClient({ "DELETE FROM chunks": new Error("disk full") });

    await expect(
      withTransaction(async () => client, (db) => db.query("DELETE FROM chunks")),
    ).rejects.toThrow("disk full");
    expect(client.statements).toEqual(["BEGIN", "DELETE FROM chunks", "ROLLBACK"]);
    expect(client.releases).toEqual([undefined]);
  });

  it("keeps the original error and destroys the connection when ROLLBACK fails", async () => {
    const connectionLost = new Error("connection terminated");
    const client = new RecordingClient({
      "DELETE FROM chunks": new Error("disk full"),
      ROLLBACK: connectionLost,
    });

    await expect(
      withTransaction(async () => client, (db) => db.query("DELETE FROM chunks")),
    ).rejects.toThrow("disk full");
    expect(client.releases).toEqual([connectionLost]);
  });
});
