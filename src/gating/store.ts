import crypto from "node:crypto";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import lockfile from "proper-lockfile";
import type {
  GateMemberRef,
  GateRecordStore,
  MemberGateRecord,
  PassedMember,
} from "./types.js";
import { resolveStateDir } from "../config/paths.js";
import { buildGateKey } from "./types.js";

type GateRecordFile = {
  version: 1;
  records: MemberGateRecord[];
  passed: PassedMember[];
};

const STORE_LOCK_OPTIONS = {
  retries: {
    retries: 8,
    factor: 2,
    minTimeout: 50,
    maxTimeout: 5000,
    randomize: true,
  },
  stale: 30_000,
} as const;

function emptyStore(): GateRecordFile {
  return { version: 1, records: [], passed: [] };
}

export function resolveGateStorePath(env: NodeJS.ProcessEnv = process.env): string {
  const stateDir = resolveStateDir(env, os.homedir);
  return path.join(stateDir, "gating", "records.json");
}

function isGateRecord(value: unknown): value is MemberGateRecord {
  if (!value || typeof value !== "object") {
    return false;
  }
  const entry = value as Record<string, unknown>;
  return (
    typeof entry.groupId === "string" &&
    typeof entry.memberId === "string" &&
    (entry.phase === "pending" || entry.phase === "answering" || entry.phase === "resolved") &&
    typeof entry.questionId === "string" &&
    typeof entry.attemptsRemaining === "number" &&
    typeof entry.deadline === "string" &&
    typeof entry.createdAt === "string"
  );
}

function isPassedMember(value: unknown): value is PassedMember {
  if (!value || typeof value !== "object") {
    return false;
  }
  const entry = value as Record<string, unknown>;
  return (
    typeof entry.groupId === "string" &&
    typeof entry.memberId === "string" &&
    typeof entry.passedAt === "string"
  );
}

function sameMember(entry: GateMemberRef, groupId: string, memberId: string): boolean {
  return entry.groupId === groupId && entry.memberId === memberId;
}

async function readStoreFile(filePath: string): Promise<GateRecordFile> {
  let raw: string;
  try {
    raw = await fs.promises.readFile(filePath, "utf-8");
  } catch (err) {
    const code = (err as { code?: string }).code;
    if (code === "ENOENT") {
      return emptyStore();
    }
    throw err;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return emptyStore();
  }
  if (!parsed || typeof parsed !== "object") {
    return emptyStore();
  }
  const candidate = parsed as { version?: unknown; records?: unknown; passed?: unknown };
  if (candidate.version !== 1 || !Array.isArray(candidate.records)) {
    return emptyStore();
  }
  return {
    version: 1,
    records: candidate.records.filter(isGateRecord),
    passed: Array.isArray(candidate.passed) ? candidate.passed.filter(isPassedMember) : [],
  };
}

async function writeStoreFile(filePath: string, value: GateRecordFile): Promise<void> {
  const dir = path.dirname(filePath);
  await fs.promises.mkdir(dir, { recursive: true, mode: 0o700 });
  const tmp = path.join(dir, `${path.basename(filePath)}.${crypto.randomUUID()}.tmp`);
  await fs.promises.writeFile(tmp, `${JSON.stringify(value, null, 2)}\n`, {
    encoding: "utf-8",
  });
  await fs.promises.chmod(tmp, 0o600);
  await fs.promises.rename(tmp, filePath);
}

async function ensureStoreFile(filePath: string): Promise<void> {
  try {
    await fs.promises.access(filePath);
  } catch {
    await writeStoreFile(filePath, emptyStore());
  }
}

async function withStoreLock<T>(filePath: string, fn: () => Promise<T>): Promise<T> {
  await ensureStoreFile(filePath);
  const release = await lockfile.lock(filePath, STORE_LOCK_OPTIONS);
  try {
    return await fn();
  } finally {
    await release();
  }
}

async function updateStore(
  filePath: string,
  updater: (current: GateRecordFile) => GateRecordFile,
): Promise<void> {
  await withStoreLock(filePath, async () => {
    const current = await readStoreFile(filePath);
    await writeStoreFile(filePath, updater(current));
  });
}

export function createFileGateRecordStore(
  params: { filePath?: string } = {},
): GateRecordStore & { filePath: string } {
  const filePath = params.filePath ?? resolveGateStorePath();

  async function saveRecord(record: MemberGateRecord): Promise<void> {
    const key = buildGateKey(record);
    await updateStore(filePath, (current) => ({
      ...current,
      records: [...current.records.filter((entry) => buildGateKey(entry) !== key), { ...record }],
    }));
  }

  async function loadRecord(groupId: string, memberId: string): Promise<MemberGateRecord | null> {
    const store = await readStoreFile(filePath);
    return store.records.find((entry) => sameMember(entry, groupId, memberId)) ?? null;
  }

  async function deleteRecord(groupId: string, memberId: string): Promise<void> {
    await updateStore(filePath, (current) => ({
      ...current,
      records: current.records.filter((entry) => !sameMember(entry, groupId, memberId)),
    }));
  }

  async function listRecords(): Promise<MemberGateRecord[]> {
    const store = await readStoreFile(filePath);
    return store.records;
  }

  async function savePassed(entry: PassedMember): Promise<void> {
    await updateStore(filePath, (current) => ({
      ...current,
      passed: [
        ...current.passed.filter((item) => !sameMember(item, entry.groupId, entry.memberId)),
        { ...entry },
      ],
    }));
  }

  async function deletePassed(groupId: string, memberId: string): Promise<void> {
    await updateStore(filePath, (current) => ({
      ...current,
      passed: current.passed.filter((item) => !sameMember(item, groupId, memberId)),
    }));
  }

  async function listPassed(): Promise<PassedMember[]> {
    const store = await readStoreFile(filePath);
    return store.passed;
  }

  return {
    filePath,
    saveRecord,
    loadRecord,
    deleteRecord,
    listRecords,
    savePassed,
    deletePassed,
    listPassed,
  };
}

export function createMemoryGateRecordStore(): GateRecordStore {
  const records = new Map<string, MemberGateRecord>();
  const passed = new Map<string, PassedMember>();
  return {
    saveRecord: async (record) => {
      records.set(buildGateKey(record), { ...record });
    },
    loadRecord: async (groupId, memberId) => {
      const record = records.get(buildGateKey({ groupId, memberId }));
      return record ? { ...record } : null;
    },
    deleteRecord: async (groupId, memberId) => {
      records.delete(buildGateKey({ groupId, memberId }));
    },
    listRecords: async () => Array.from(records.values(), (record) => ({ ...record })),
    savePassed: async (entry) => {
      passed.set(buildGateKey(entry), { ...entry });
    },
    deletePassed: async (groupId, memberId) => {
      passed.delete(buildGateKey({ groupId, memberId }));
    },
    listPassed: async () => Array.from(passed.values(), (entry) => ({ ...entry })),
  };
}
