import type { SubsystemLogger } from "../logging.js";
import type { QuestionBank } from "./questions.js";
import type {
  GateEventResult,
  GateMemberRef,
  GateNotice,
  GatePolicy,
  GateRecordStore,
  GateRemovalOptions,
  GateTransport,
  MemberGateRecord,
  PassedMember,
  Question,
} from "./types.js";
import { createSubsystemLogger } from "../logging.js";
import { validateAnswer } from "./answers.js";
import {
  describeError,
  TransportActionFailedError,
  UnknownQuestionError,
  type TransportAction,
} from "./errors.js";
import { createKeyedQueue } from "./keyed-queue.js";
import { buildOutcomeText, buildPromptText } from "./messages.js";
import { createDeadlineScheduler } from "./scheduler.js";
import { buildGateKey } from "./types.js";

export type GateServiceParams = {
  policy: GatePolicy;
  bank: QuestionBank;
  transport: GateTransport;
  /** Durable copy of active records. Without it, in-flight gates are lost on restart. */
  store?: GateRecordStore;
  now?: () => Date;
  log?: SubsystemLogger;
};

export type GateService = {
  handleMemberJoined: (member: GateMemberRef) => Promise<GateEventResult>;
  handleMessage: (params: GateMemberRef & { text: string }) => Promise<GateEventResult>;
  handleTimeout: (params: GateMemberRef & { deadline?: string }) => Promise<GateEventResult>;
  handleMemberLeft: (member: GateMemberRef) => Promise<GateEventResult>;
  handleDirectMessage: (params: { memberId: string; text: string }) => Promise<GateEventResult[]>;
  resendPrompts: (memberId: string, groupId?: string) => Promise<number>;
  revokePass: (member: GateMemberRef) => Promise<GateEventResult>;
  hasPassed: (member: GateMemberRef) => boolean;
  restore: () => Promise<number>;
  getRecord: (member: GateMemberRef) => MemberGateRecord | null;
  listRecords: () => MemberGateRecord[];
  idle: () => Promise<void>;
  shutdown: () => Promise<void>;
};

type TerminalOutcome = GateNotice["outcome"];

function snapshot(record: MemberGateRecord): MemberGateRecord {
  return { ...record };
}

function refOf(member: GateMemberRef): GateMemberRef {
  return { groupId: member.groupId, memberId: member.memberId };
}

export function createGateService(params: GateServiceParams): GateService {
  const { policy, bank, transport, store } = params;
  const now = params.now ?? (() => new Date());
  const log = params.log ?? createSubsystemLogger("gate");
  const records = new Map<string, MemberGateRecord>();
  const passedMembers = new Map<string, PassedMember>();
  // Group a member picked for private answers with /start <groupId>.
  const answerFocus = new Map<string, string>();
  const queue = createKeyedQueue();
  const scheduler = createDeadlineScheduler({
    now,
    onTimeout: (key, deadline) => {
      const record = records.get(key);
      if (!record) {
        return;
      }
      void handleTimeout({ groupId: record.groupId, memberId: record.memberId, deadline });
    },
  });

  // Every state change for a group:member pair goes through here, one at a time.
  async function dispatch<T>(
    member: GateMemberRef,
    fallback: T,
    task: () => Promise<T>,
  ): Promise<T> {
    return await queue.run(buildGateKey(member), async () => {
      try {
        return await task();
      } catch (err) {
        log.error("gate event failed", {
          groupId: member.groupId,
          memberId: member.memberId,
          error: describeError(err),
        });
        return fallback;
      }
    });
  }

  async function persist(record: MemberGateRecord): Promise<void> {
    if (!store) {
      return;
    }
    try {
      await store.saveRecord(record);
    } catch (err) {
      log.warn("failed to persist gate record", {
        groupId: record.groupId,
        memberId: record.memberId,
        error: describeError(err),
      });
    }
  }

  // Marks the record resolved before deleting it, so a failed delete never
  // leaves an active record behind for restore() to act on.
  async function forget(record: MemberGateRecord): Promise<void> {
    if (!store) {
      return;
    }
    if (record.phase !== "resolved") {
      try {
        await store.saveRecord({ ...record, phase: "resolved" });
      } catch (err) {
        log.warn("failed to mark gate record resolved", {
          groupId: record.groupId,
          memberId: record.memberId,
          error: describeError(err),
        });
      }
    }
    try {
      await store.deleteRecord(record.groupId, record.memberId);
    } catch (err) {
      log.warn("failed to delete gate record", {
        groupId: record.groupId,
        memberId: record.memberId,
        error: describeError(err),
      });
    }
  }

  async function attempt(
    action: TransportAction,
    member: GateMemberRef,
    fn: () => Promise<void>,
  ): Promise<boolean> {
    try {
      await fn();
      return true;
    } catch (err) {
      const failure = new TransportActionFailedError(action, member, err);
      log.warn(failure.message, { action, groupId: member.groupId, memberId: member.memberId });
      return false;
    }
  }

  function update(record: MemberGateRecord, patch: Partial<MemberGateRecord>): MemberGateRecord {
    const next = { ...record, ...patch };
    records.set(buildGateKey(record), next);
    return next;
  }

  async function sendPrompt(
    record: MemberGateRecord,
    question: Question,
    retry: boolean,
  ): Promise<void> {
    const text = buildPromptText({
      question,
      attemptsRemaining: record.attemptsRemaining,
      deadline: record.deadline,
      retry,
      now: now(),
    });
    await attempt("prompt", record, () =>
      transport.sendPrompt({
        groupId: record.groupId,
        memberId: record.memberId,
        question,
        text,
        retry,
      }),
    );
  }

  async function notify(
    record: MemberGateRecord,
    outcome: TerminalOutcome,
    options: { removed?: boolean; retryAfterMs?: number } = {},
  ): Promise<void> {
    const send = transport.notify;
    if (!send) {
      return;
    }
    await attempt("notify", record, () =>
      send({
        groupId: record.groupId,
        memberId: record.memberId,
        outcome,
        text: buildOutcomeText(outcome, options),
      }),
    );
  }

  async function discard(record: MemberGateRecord): Promise<MemberGateRecord> {
    const key = buildGateKey(record);
    scheduler.cancel(key);
    records.delete(key);
    if (answerFocus.get(record.memberId) === record.groupId) {
      answerFocus.delete(record.memberId);
    }
    await forget(record);
    return { ...record, phase: "resolved" };
  }

  function removalOptions(outcome: TerminalOutcome): GateRemovalOptions | undefined {
    // A vanished question is not the member's fault, so no wait before rejoining.
    if (policy.retryCooldownMs <= 0 || outcome === "unknown-question") {
      return undefined;
    }
    return { until: new Date(now().getTime() + policy.retryCooldownMs) };
  }

  async function removeMember(
    member: GateMemberRef,
    options: GateRemovalOptions | undefined,
  ): Promise<boolean> {
    const remove = options
      ? () => transport.removeMember(refOf(member), options)
      : () => transport.removeMember(refOf(member));
    for (let round = 0; round <= policy.removalRetries; round += 1) {
      if (await attempt("remove", member, remove)) {
        return true;
      }
    }
    // Still restricted: the member stays in the group without chat rights.
    log.error("giving up on removing member", {
      groupId: member.groupId,
      memberId: member.memberId,
    });
    return false;
  }

  async function rememberPassed(member: GateMemberRef): Promise<void> {
    const entry: PassedMember = { ...refOf(member), passedAt: now().toISOString() };
    passedMembers.set(buildGateKey(member), entry);
    if (!store) {
      return;
    }
    try {
      await store.savePassed(entry);
    } catch (err) {
      log.warn("failed to persist passed member", {
        groupId: member.groupId,
        memberId: member.memberId,
        error: describeError(err),
      });
    }
  }

  async function pass(record: MemberGateRecord): Promise<GateEventResult> {
    scheduler.cancel(buildGateKey(record));
    await attempt("unrestrict", record, () => transport.unrestrictMember(refOf(record)));
    await rememberPassed(record);
    const resolved = await discard(record);
    log.info("member passed gate", { groupId: record.groupId, memberId: record.memberId });
    await notify(record, "passed");
    return { handled: true, outcome: "passed", record: resolved };
  }

  async function reject(
    record: MemberGateRecord,
    outcome: TerminalOutcome,
  ): Promise<GateEventResult> {
    scheduler.cancel(buildGateKey(record));
    const options = removalOptions(outcome);
    const removed = await removeMember(record, options);
    const resolved = await discard(record);
    log.info(removed ? "member removed by gate" : "member left muted by gate", {
      groupId: record.groupId,
      memberId: record.memberId,
      outcome,
    });
    await notify(record, outcome, {
      removed,
      retryAfterMs: options ? policy.retryCooldownMs : undefined,
    });
    return { handled: true, outcome, record: resolved };
  }

  function lookupQuestion(record: MemberGateRecord): Question | null {
    try {
      return bank.lookup(record.questionId);
    } catch (err) {
      if (err instanceof UnknownQuestionError) {
        log.warn("gate record references an unknown question", {
          groupId: record.groupId,
          memberId: record.memberId,
          questionId: record.questionId,
        });
        return null;
      }
      throw err;
    }
  }

  // Pending -> Answering: restriction acknowledged (or failed and logged), prompt sent.
  async function activate(record: MemberGateRecord, question: Question): Promise<MemberGateRecord> {
    await attempt("restrict", record, () => transport.restrictMember(refOf(record)));
    const answering = update(record, { phase: "answering" });
    await persist(answering);
    await sendPrompt(answering, question, false);
    return answering;
  }

  function isExpired(record: MemberGateRecord): boolean {
    return Date.parse(record.deadline) <= now().getTime();
  }

  async function resume(record: MemberGateRecord): Promise<void> {
    if (record.phase === "resolved") {
      await forget(record);
      return;
    }
    const key = buildGateKey(record);
    records.set(key, snapshot(record));
    scheduler.arm(key, record.deadline);
    if (record.phase !== "pending" || isExpired(record)) {
      return;
    }
    const question = lookupQuestion(record);
    if (!question) {
      await reject(record, "unknown-question");
      return;
    }
    await activate(record, question);
  }

  async function loadPersisted(member: GateMemberRef): Promise<MemberGateRecord | null> {
    if (!store) {
      return null;
    }
    try {
      return await store.loadRecord(member.groupId, member.memberId);
    } catch (err) {
      log.warn("failed to load gate record", {
        groupId: member.groupId,
        memberId: member.memberId,
        error: describeError(err),
      });
      return null;
    }
  }

  async function handleMemberJoined(member: GateMemberRef): Promise<GateEventResult> {
    return await dispatch<GateEventResult>(member, { handled: false }, async () => {
      const key = buildGateKey(member);
      const existing = records.get(key);
      if (existing) {
        log.debug("duplicate join ignored", { groupId: member.groupId, memberId: member.memberId });
        return { handled: false, reason: "duplicate-join", record: snapshot(existing) };
      }
      if (passedMembers.has(key)) {
        log.debug("member already passed", { groupId: member.groupId, memberId: member.memberId });
        return { handled: false, reason: "already-passed" };
      }
      const persisted = await loadPersisted(member);
      if (persisted?.phase === "resolved") {
        await forget(persisted);
      } else if (persisted) {
        await resume(persisted);
        return { handled: false, reason: "duplicate-join", record: snapshot(persisted) };
      }
      const question = bank.pick(member.groupId, member.memberId);
      const createdAt = now();
      const record: MemberGateRecord = {
        groupId: member.groupId,
        memberId: member.memberId,
        phase: "pending",
        questionId: question.id,
        attemptsRemaining: policy.attempts,
        deadline: new Date(createdAt.getTime() + policy.timeoutMs).toISOString(),
        createdAt: createdAt.toISOString(),
      };
      records.set(key, record);
      scheduler.arm(key, record.deadline);
      await persist(record);
      log.info("member gated", {
        groupId: member.groupId,
        memberId: member.memberId,
        questionId: question.id,
        deadline: record.deadline,
      });
      const answering = await activate(record, question);
      return { handled: true, outcome: "gated", record: snapshot(answering) };
    });
  }

  async function handleMessage(
    paramsMessage: GateMemberRef & { text: string },
  ): Promise<GateEventResult> {
    const member = refOf(paramsMessage);
    return await dispatch<GateEventResult>(member, { handled: false }, async () => {
      const record = records.get(buildGateKey(member));
      if (!record) {
        return { handled: false, reason: "no-record" };
      }
      if (record.phase !== "answering") {
        return { handled: false, reason: "not-answering", record: snapshot(record) };
      }
      if (isExpired(record)) {
        return await reject(record, "timed-out");
      }
      const question = lookupQuestion(record);
      if (!question) {
        return await reject(record, "unknown-question");
      }
      if (validateAnswer(question, paramsMessage.text)) {
        return await pass(record);
      }
      if (record.attemptsRemaining <= 1) {
        return await reject(record, "failed");
      }
      const nextQuestion =
        policy.onWrongAnswer === "reroll" ? bank.pick(record.groupId, record.memberId) : question;
      const updated = update(record, {
        attemptsRemaining: record.attemptsRemaining - 1,
        questionId: nextQuestion.id,
      });
      await persist(updated);
      await sendPrompt(updated, nextQuestion, true);
      return { handled: true, outcome: "reprompted", record: snapshot(updated) };
    });
  }

  async function handleTimeout(
    paramsTimeout: GateMemberRef & { deadline?: string },
  ): Promise<GateEventResult> {
    const member = refOf(paramsTimeout);
    return await dispatch<GateEventResult>(member, { handled: false }, async () => {
      const record = records.get(buildGateKey(member));
      // A deadline that differs belongs to an earlier record for the same member.
      if (
        !record ||
        (paramsTimeout.deadline !== undefined && paramsTimeout.deadline !== record.deadline)
      ) {
        return { handled: false, reason: "stale-timeout" };
      }
      return await reject(record, "timed-out");
    });
  }

  async function handleMemberLeft(member: GateMemberRef): Promise<GateEventResult> {
    return await dispatch<GateEventResult>(member, { handled: false }, async () => {
      const record = records.get(buildGateKey(member));
      if (!record) {
        return { handled: false, reason: "no-record" };
      }
      const resolved = await discard(record);
      log.info("gated member left", { groupId: member.groupId, memberId: member.memberId });
      return { handled: true, outcome: "left", record: resolved };
    });
  }

  function recordsForMember(memberId: string): MemberGateRecord[] {
    return Array.from(records.values()).filter((record) => record.memberId === memberId);
  }

  function answeringRecordsFor(memberId: string): MemberGateRecord[] {
    return recordsForMember(memberId).filter((record) => record.phase === "answering");
  }

  // Passes the record if the text answers its question; never costs an attempt.
  async function acceptIfCorrect(target: GateMemberRef, text: string): Promise<GateEventResult> {
    return await dispatch<GateEventResult>(target, { handled: false }, async () => {
      const record = records.get(buildGateKey(target));
      if (!record) {
        return { handled: false, reason: "no-record" };
      }
      if (record.phase !== "answering" || isExpired(record)) {
        return { handled: false, reason: "no-match", record: snapshot(record) };
      }
      const question = lookupQuestion(record);
      if (!question || !validateAnswer(question, text)) {
        return { handled: false, reason: "no-match", record: snapshot(record) };
      }
      return await pass(record);
    });
  }

  // A private message carries no group. It counts as an attempt only when the
  // target group is unambiguous: a single gate, or one picked with /start.
  async function handleDirectMessage(paramsDirect: {
    memberId: string;
    text: string;
  }): Promise<GateEventResult[]> {
    const { memberId, text } = paramsDirect;
    const targets = answeringRecordsFor(memberId);
    const focusGroup = answerFocus.get(memberId);
    const focused = targets.find((record) => record.groupId === focusGroup);
    if (focused) {
      return [await handleMessage({ groupId: focused.groupId, memberId, text })];
    }
    if (targets.length <= 1) {
      return await Promise.all(
        targets.map((record) => handleMessage({ groupId: record.groupId, memberId, text })),
      );
    }
    const results = await Promise.all(targets.map((record) => acceptIfCorrect(record, text)));
    const passed = results.filter((result) => result.outcome === "passed");
    if (passed.length > 0) {
      return passed;
    }
    return [{ handled: false, reason: "ambiguous-target" }];
  }

  async function resendPrompts(memberId: string, groupId?: string): Promise<number> {
    const targets = recordsForMember(memberId).filter(
      (record) => groupId === undefined || record.groupId === groupId,
    );
    if (groupId !== undefined && targets.length > 0) {
      answerFocus.set(memberId, groupId);
    }
    const sent = await Promise.all(
      targets.map((target) =>
        dispatch<boolean>(target, false, async () => {
          const record = records.get(buildGateKey(target));
          if (!record || record.phase !== "answering") {
            return false;
          }
          const question = lookupQuestion(record);
          if (!question) {
            await reject(record, "unknown-question");
            return false;
          }
          await sendPrompt(record, question, false);
          return true;
        }),
      ),
    );
    return sent.filter(Boolean).length;
  }

  async function revokePass(member: GateMemberRef): Promise<GateEventResult> {
    const ref = refOf(member);
    return await dispatch<GateEventResult>(ref, { handled: false }, async () => {
      const key = buildGateKey(ref);
      const wasPassed = passedMembers.delete(key);
      if (store) {
        try {
          await store.deletePassed(ref.groupId, ref.memberId);
        } catch (err) {
          log.warn("failed to delete passed member", {
            groupId: ref.groupId,
            memberId: ref.memberId,
            error: describeError(err),
          });
        }
      }
      const record = records.get(key);
      const resolved = record ? await discard(record) : undefined;
      if (!wasPassed && !resolved) {
        return { handled: false, reason: "no-record" };
      }
      log.info("member pass revoked", { groupId: ref.groupId, memberId: ref.memberId });
      return { handled: true, outcome: "revoked", record: resolved };
    });
  }

  async function restore(): Promise<number> {
    if (!store) {
      return 0;
    }
    let persisted: MemberGateRecord[];
    try {
      for (const entry of await store.listPassed()) {
        passedMembers.set(buildGateKey(entry), { ...entry });
      }
      persisted = await store.listRecords();
    } catch (err) {
      log.error("failed to read persisted gate records", { error: describeError(err) });
      return 0;
    }
    const restored = await Promise.all(
      persisted.map((record) =>
        dispatch<boolean>(record, false, async () => {
          if (records.has(buildGateKey(record))) {
            return false;
          }
          await resume(record);
          return record.phase !== "resolved";
        }),
      ),
    );
    const count = restored.filter(Boolean).length;
    if (count > 0) {
      log.info("restored gate records", { count });
    }
    return count;
  }

  function getRecord(member: GateMemberRef): MemberGateRecord | null {
    const record = records.get(buildGateKey(member));
    return record ? snapshot(record) : null;
  }

  async function shutdown(): Promise<void> {
    scheduler.clear();
    await queue.idle();
    // Tasks that were still running may have armed new timers.
    scheduler.clear();
  }

  return {
    handleMemberJoined,
    handleMessage,
    handleTimeout,
    handleMemberLeft,
    handleDirectMessage,
    resendPrompts,
    revokePass,
    hasPassed: (member) => passedMembers.has(buildGateKey(member)),
    restore,
    getRecord,
    listRecords: () => Array.from(records.values(), snapshot),
    idle: () => queue.idle(),
    shutdown,
  };
}
