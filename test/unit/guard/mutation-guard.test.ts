import { describe, it, expect, vi } from "vitest";
import pino from "pino";

import { MutationGuard, type GuardedResource } from "../../../src/guard/mutation-guard.js";
import type { BackupRef, BackupStore } from "../../../src/backup/backup-store.js";
import type { BackupRecord, ZoneCode } from "../../../src/core/types.js";
import {
  QuotaHaltedError,
  RemoteRejectedError,
  ResourceStateError,
} from "../../../src/core/errors.js";

// ── Fakes ────────────────────────────────────────────────────────────────

class MemoryBackupStore implements BackupStore {
  readonly records: BackupRecord[] = [];
  failWith: Error | null = null;

  async write(record: BackupRecord): Promise<string> {
    if (this.failWith) throw this.failWith;
    this.records.push(record);
    return `memory://${this.records.length}`;
  }

  async latest(ref: BackupRef): Promise<BackupRecord | null> {
    const matching = this.records.filter((r) => r.resourceId === ref.resourceId);
    return matching[matching.length - 1] ?? null;
  }
}

class FakeResource implements GuardedResource {
  readonly kind = "user";
  readonly zone = "UBS" as ZoneCode;
  readonly environment = "production";
  readonly format = "json";
  resourceId: string | null = "test-user";
  failure: unknown = null;
  lastFetchedPayload: string | null = '{"cached":true}';
  local = '{"local":true}';
  remote = '{"remote":true}';
  fetchRemotePayload = vi.fn(async () => this.remote);

  get failed(): boolean {
    return this.failure !== null;
  }
  serialize(): string {
    return this.local;
  }
  markFailed(error: unknown): void {
    this.failure = error;
  }
  clearFailure(): void {
    this.failure = null;
  }
}

function createGuard(
  store: BackupStore,
  options: { refresh?: boolean; strict?: boolean } = {},
): MutationGuard {
  return new MutationGuard(
    store,
    { directory: "unused", refreshBeforeMutation: options.refresh ?? true },
    { strict: options.strict ?? false },
    pino({ level: "silent" }),
  );
}

// ── Tests ────────────────────────────────────────────────────────────────

describe("MutationGuard", () => {
  it("writes the backup before running the commit", async () => {
    const store = new MemoryBackupStore();
    const handle = new FakeResource();
    const order: string[] = [];
    vi.spyOn(store, "write").mockImplementation(async (record) => {
      order.push(`backup:${record.operation}`);
      return "memory://1";
    });

    await createGuard(store).guard("update", handle, async () => {
      order.push("commit");
    });

    expect(order).toEqual(["backup:update", "commit"]);
  });

  it("backs up the fresh remote state for an update", async () => {
    const store = new MemoryBackupStore();
    const handle = new FakeResource();

    await createGuard(store).guard("update", handle, async () => {});

    expect(handle.fetchRemotePayload).toHaveBeenCalledTimes(1);
    expect(store.records[0]).toMatchObject({
      kind: "user",
      zone: "UBS",
      environment: "production",
      resourceId: "test-user",
      operation: "update",
      format: "json",
      payload: '{"remote":true}',
    });
  });

  it("backs up the last fetched state when refresh is off", async () => {
    const store = new MemoryBackupStore();
    const handle = new FakeResource();

    await createGuard(store, { refresh: false }).guard("delete", handle, async () => {});

    expect(handle.fetchRemotePayload).not.toHaveBeenCalled();
    expect(store.records[0]?.payload).toBe('{"cached":true}');
  });

  it("backs up the outgoing payload for a create", async () => {
    const store = new MemoryBackupStore();
    const handle = new FakeResource();
    handle.resourceId = null;

    await createGuard(store).guard("create", handle, async () => {
      handle.resourceId = "assigned-id";
    });

    expect(store.records[0]).toMatchObject({ resourceId: "new", payload: '{"local":true}' });
    expect(handle.resourceId).toBe("assigned-id");
  });

  it("uses an explicit backup payload when given", async () => {
    const store = new MemoryBackupStore();

    await createGuard(store).guard("create", new FakeResource(), async () => {}, {
      backupPayload: '{"parameter":[]}',
    });

    expect(store.records[0]?.payload).toBe('{"parameter":[]}');
  });

  it("commits without backup or fetch when the backup is skipped", async () => {
    const store = new MemoryBackupStore();
    const handle = new FakeResource();
    const commit = vi.fn(async () => {});

    await createGuard(store).guard("delete", handle, commit, { skipBackup: true });

    expect(commit).toHaveBeenCalledTimes(1);
    expect(store.records).toHaveLength(0);
    expect(handle.fetchRemotePayload).not.toHaveBeenCalled();
    expect(handle.failed).toBe(false);
  });

  it("skips the commit when the backup fails and marks the handle failed", async () => {
    const store = new MemoryBackupStore();
    store.failWith = new Error("disk full");
    const handle = new FakeResource();
    const commit = vi.fn(async () => {});

    const result = await createGuard(store).guard("update", handle, commit);

    expect(result).toBe(handle);
    expect(commit).not.toHaveBeenCalled();
    expect(handle.failed).toBe(true);
    expect(handle.failure).toBe(store.failWith);
  });

  it("marks the handle failed when there is no state to back up", async () => {
    const store = new MemoryBackupStore();
    const handle = new FakeResource();
    handle.lastFetchedPayload = null;

    await createGuard(store, { refresh: false }).guard("update", handle, async () => {});

    expect(handle.failure).toBeInstanceOf(ResourceStateError);
    expect(store.records).toHaveLength(0);
  });

  it("turns a remote rejection into a failed handle without throwing", async () => {
    const store = new MemoryBackupStore();
    const handle = new FakeResource();
    const rejection = new RemoteRejectedError(400, "", "Invalid user");

    await createGuard(store).guard("update", handle, async () => {
      throw rejection;
    });

    expect(handle.failure).toBe(rejection);
    expect(store.records).toHaveLength(1);
  });

  it("does nothing at all on an already failed handle", async () => {
    const store = new MemoryBackupStore();
    const handle = new FakeResource();
    handle.markFailed(new Error("earlier"));
    const commit = vi.fn(async () => {});

    await createGuard(store).guard("delete", handle, commit);

    expect(commit).not.toHaveBeenCalled();
    expect(handle.fetchRemotePayload).not.toHaveBeenCalled();
    expect(store.records).toHaveLength(0);
  });

  it("rethrows in strict mode after marking the handle", async () => {
    const store = new MemoryBackupStore();
    const handle = new FakeResource();
    const rejection = new RemoteRejectedError(400, "", "Invalid user");

    await expect(
      createGuard(store, { strict: true }).guard("update", handle, async () => {
        throw rejection;
      }),
    ).rejects.toBe(rejection);
    expect(handle.failure).toBe(rejection);
  });

  it("always lets QuotaHaltedError escape and leaves the handle healthy", async () => {
    const store = new MemoryBackupStore();
    const handle = new FakeResource();
    const halted = new QuotaHaltedError(4000, 5000);
    handle.fetchRemotePayload.mockRejectedValueOnce(halted);

    await expect(createGuard(store).guard("update", handle, async () => {})).rejects.toBe(halted);
    expect(handle.failed).toBe(false);
  });

  // ── refuse ────────────────────────────────────────────────────────────

  it("refuse marks a healthy handle failed without backup or fetch", async () => {
    const store = new MemoryBackupStore();
    const handle = new FakeResource();
    const refusal = new ResourceStateError("not supported");

    const result = await createGuard(store).refuse("update", handle, refusal);

    expect(result).toBe(handle);
    expect(handle.failure).toBe(refusal);
    expect(handle.fetchRemotePayload).not.toHaveBeenCalled();
    expect(store.records).toHaveLength(0);
  });

  it("refuse keeps the first failure of an already failed handle", async () => {
    const handle = new FakeResource();
    const earlier = new Error("earlier");
    handle.markFailed(earlier);

    await createGuard(new MemoryBackupStore()).refuse(
      "delete",
      handle,
      new ResourceStateError("not supported"),
    );

    expect(handle.failure).toBe(earlier);
  });

  it("refuse rethrows in strict mode", async () => {
    const refusal = new ResourceStateError("not supported");

    await expect(
      createGuard(new MemoryBackupStore(), { strict: true }).refuse(
        "create",
        new FakeResource(),
        refusal,
      ),
    ).rejects.toBe(refusal);
  });

  // ── snapshot ──────────────────────────────────────────────────────────

  it("snapshot writes a save backup of the in-memory state", async () => {
    const store = new MemoryBackupStore();
    const handle = new FakeResource();

    await createGuard(store).snapshot(handle);

    expect(store.records[0]).toMatchObject({ operation: "save", payload: '{"local":true}' });
  });

  it("snapshot failure marks the handle failed", async () => {
    const store = new MemoryBackupStore();
    store.failWith = new Error("read-only file system");
    const handle = new FakeResource();

    await createGuard(store).snapshot(handle);

    expect(handle.failure).toBe(store.failWith);
  });
});
