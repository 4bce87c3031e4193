import { describe, expect, it, vi } from "vitest";
import type { SubsystemLogger } from "../logging.js";
import type { GateConfig } from "../config/types.js";
import type { GateService } from "../gating/service.js";
import type { GateEventResult, GateMemberRef, MemberGateRecord } from "../gating/types.js";
import { createGateUpdateHandlers } from "./handlers.js";

const silentLog: SubsystemLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

const GATED: GateEventResult = { handled: true, outcome: "gated" };

function createFakeService() {
  const service = {
    handleMemberJoined: vi.fn(async (_member: GateMemberRef) => GATED),
    handleMessage: vi.fn(
      async (_params: GateMemberRef & { text: string }): Promise<GateEventResult> => ({
        handled: false,
        reason: "no-record",
      }),
    ),
    handleTimeout: vi.fn(
      async (_params: GateMemberRef & { deadline?: string }): Promise<GateEventResult> => ({
        handled: false,
      }),
    ),
    handleMemberLeft: vi.fn(
      async (_member: GateMemberRef): Promise<GateEventResult> => ({
        handled: true,
        outcome: "left",
      }),
    ),
    handleDirectMessage: vi.fn(
      async (_params: { memberId: string; text: string }): Promise<GateEventResult[]> => [],
    ),
    resendPrompts: vi.fn(async (_memberId: string, _groupId?: string) => 0),
    revokePass: vi.fn(
      async (_member: GateMemberRef): Promise<GateEventResult> => ({
        handled: true,
        outcome: "revoked",
      }),
    ),
    hasPassed: vi.fn((_member: GateMemberRef) => false),
    restore: vi.fn(async () => 0),
    getRecord: vi.fn((_member: GateMemberRef) => null),
    listRecords: vi.fn((): MemberGateRecord[] => []),
    idle: vi.fn(async () => undefined),
    shutdown: vi.fn(async () => undefined),
  } satisfies GateService;
  return service;
}

function setup(gate?: GateConfig) {
  const service = createFakeService();
  const transport = {
    deleteMessage: vi.fn(async (_chatId: string, _messageId: number) => undefined),
    kickMember: vi.fn(async (_member: GateMemberRef) => undefined),
    banMember: vi.fn(async (_member: GateMemberRef) => undefined),
    isChatAdmin: vi.fn(async (_chatId: string, _userId: number) => true),
  };
  const handlers = createGateUpdateHandlers({
    service,
    transport,
    gate,
    botUsername: "gate_bot",
    log: silentLog,
  });
  return { service, transport, handlers };
}

describe("gate update handlers", () => {
  it("gates every human in a join message and deletes the service message", async () => {
    const { service, transport, handlers } = setup();
    const results = await handlers.onNewMembers({
      chatId: "-100",
      messageId: 9,
      members: [
        { id: 42, isBot: false },
        { id: 7, isBot: true },
        { id: 43, isBot: false },
      ],
    });
    expect(results).toEqual([GATED, GATED]);
    expect(service.handleMemberJoined.mock.calls.map(([member]) => member)).toEqual([
      { groupId: "-100", memberId: "42" },
      { groupId: "-100", memberId: "43" },
    ]);
    expect(transport.deleteMessage).toHaveBeenCalledWith("-100", 9);
  });

  it("keeps join messages when deletion is turned off", async () => {
    const { transport, handlers } = setup({ deleteJoinMessages: false });
    await handlers.onNewMembers({ chatId: "-100", messageId: 9, members: [{ id: 42, isBot: false }] });
    expect(transport.deleteMessage).not.toHaveBeenCalled();
  });

  it("still gates when the join message cannot be deleted", async () => {
    const { service, transport, handlers } = setup();
    transport.deleteMessage.mockRejectedValueOnce(new Error("message can't be deleted"));
    await handlers.onNewMembers({ chatId: "-100", messageId: 9, members: [{ id: 42, isBot: false }] });
    expect(service.handleMemberJoined).toHaveBeenCalledTimes(1);
  });

  it("ignores groups outside the configured list", async () => {
    const { service, transport, handlers } = setup({ groups: [-100] });
    expect(
      await handlers.onNewMembers({
        chatId: "-200",
        messageId: 9,
        members: [{ id: 42, isBot: false }],
      }),
    ).toEqual([]);
    expect(await handlers.onGroupText({ chatId: "-200", fromId: 42, text: "4" })).toBeNull();
    expect(service.handleMemberJoined).not.toHaveBeenCalled();
    expect(transport.deleteMessage).not.toHaveBeenCalled();

    await handlers.onNewMembers({ chatId: "-100", messageId: 9, members: [{ id: 42, isBot: false }] });
    expect(service.handleMemberJoined).toHaveBeenCalledWith({ groupId: "-100", memberId: "42" });
  });

  it("forwards departures and skips bots", async () => {
    const { service, transport, handlers } = setup({ deleteLeaveMessages: false });
    const left = await handlers.onMemberLeft({
      chatId: "-100",
      messageId: 10,
      member: { id: 42, isBot: false },
    });
    expect(left).toEqual({ handled: true, outcome: "left" });
    expect(
      await handlers.onMemberLeft({ chatId: "-100", messageId: 11, member: { id: 7, isBot: true } }),
    ).toBeNull();
    expect(service.handleMemberLeft).toHaveBeenCalledTimes(1);
    expect(transport.deleteMessage).not.toHaveBeenCalled();
  });

  it("routes group and private text to the service", async () => {
    const { service, handlers } = setup();
    await handlers.onGroupText({ chatId: "-100", fromId: 42, text: "4" });
    expect(await handlers.onPrivateText({ fromId: 42, text: "4" })).toEqual({ results: [] });
    expect(service.handleMessage).toHaveBeenCalledWith({
      groupId: "-100",
      memberId: "42",
      text: "4",
    });
    expect(service.handleDirectMessage).toHaveBeenCalledWith({ memberId: "42", text: "4" });
  });

  it("leaves commands out of the answers", async () => {
    const { service, handlers } = setup();
    expect(await handlers.onGroupText({ chatId: "-100", fromId: 42, text: "/help" })).toBeNull();
    expect(await handlers.onPrivateText({ fromId: 42, text: "/settings" })).toEqual({ results: [] });
    expect(service.handleMessage).not.toHaveBeenCalled();
    expect(service.handleDirectMessage).not.toHaveBeenCalled();
  });

  it("asks which group a private answer is for when it is unclear", async () => {
    const { service, handlers } = setup();
    const pending = (groupId: string): MemberGateRecord => ({
      groupId,
      memberId: "42",
      phase: "answering",
      questionId: "q1",
      attemptsRemaining: 2,
      deadline: "2026-01-01T00:15:00.000Z",
      createdAt: "2026-01-01T00:00:00.000Z",
    });
    service.handleDirectMessage.mockResolvedValueOnce([
      { handled: false, reason: "ambiguous-target" },
    ]);
    service.listRecords.mockReturnValueOnce([
      pending("-100"),
      { ...pending("-200"), memberId: "7" },
      pending("-300"),
    ]);
    const { reply } = await handlers.onPrivateText({ fromId: 42, text: "London" });
    expect(reply?.split("\n").slice(2)).toEqual([
      "https://t.me/gate_bot?start=-100",
      "https://t.me/gate_bot?start=-300",
    ]);
  });

  it("re-sends prompts on /start", async () => {
    const { service, handlers } = setup();
    service.resendPrompts.mockResolvedValueOnce(2);
    expect(await handlers.onPrivateStart({ fromId: 42 })).toEqual({ resent: 2 });
    expect(service.resendPrompts).toHaveBeenCalledWith("42", undefined);
    expect(await handlers.onPrivateStart({ fromId: 42 })).toEqual({
      resent: 0,
      reply: "You have no pending entry questions.",
    });
  });

  it("focuses on the group named in the /start payload", async () => {
    const { service, handlers } = setup();
    service.resendPrompts.mockResolvedValueOnce(1);
    expect(await handlers.onPrivateStart({ fromId: 42, payload: "-200" })).toEqual({ resent: 1 });
    expect(service.resendPrompts).toHaveBeenCalledWith("42", "-200");

    // An unknown group falls back to every pending prompt.
    service.resendPrompts.mockResolvedValueOnce(0).mockResolvedValueOnce(1);
    expect(await handlers.onPrivateStart({ fromId: 42, payload: "-999" })).toEqual({ resent: 1 });
    expect(service.resendPrompts).toHaveBeenLastCalledWith("42");
  });
});

describe("moderation commands", () => {
  const ADMIN = { id: 1, isBot: false, name: "Admin" };

  it("refuses members who are not admins", async () => {
    const { service, transport, handlers } = setup();
    transport.isChatAdmin.mockResolvedValueOnce(false);
    const reply = await handlers.onModerationCommand({
      chatId: "-100",
      command: "ban",
      from: { id: 5, isBot: false },
      args: "42",
      mentions: [],
    });
    expect(reply).toBe("Only group admins can use this command.");
    expect(transport.isChatAdmin).toHaveBeenCalledWith("-100", 5);
    expect(transport.banMember).not.toHaveBeenCalled();
    expect(service.revokePass).not.toHaveBeenCalled();
  });

  it("kicks the author of the replied message and clears their pass", async () => {
    const { service, transport, handlers } = setup();
    const reply = await handlers.onModerationCommand({
      chatId: "-100",
      command: "kick",
      from: ADMIN,
      args: "",
      replyTo: { id: 42, isBot: false, name: "Alice" },
      mentions: [{ id: 43, isBot: false, name: "Bob" }],
    });
    expect(reply).toBe("Alice has been kicked.");
    expect(transport.kickMember).toHaveBeenCalledWith({ groupId: "-100", memberId: "42" });
    expect(service.revokePass).toHaveBeenCalledWith({ groupId: "-100", memberId: "42" });
  });

  it("bans a mentioned member or a user id", async () => {
    const { transport, handlers } = setup();
    expect(
      await handlers.onModerationCommand({
        chatId: "-100",
        command: "ban",
        from: ADMIN,
        args: "Bob",
        mentions: [{ id: 43, isBot: false, name: "Bob" }],
      }),
    ).toBe("Bob has been banned.");
    expect(
      await handlers.onModerationCommand({
        chatId: "-100",
        command: "ban",
        from: ADMIN,
        args: " 44 spam",
        mentions: [],
      }),
    ).toBe("44 has been banned.");
    expect(transport.banMember.mock.calls.map(([member]) => member.memberId)).toEqual(["43", "44"]);
  });

  it("explains the usage when there is no target", async () => {
    const { transport, handlers } = setup();
    const reply = await handlers.onModerationCommand({
      chatId: "-100",
      command: "kick",
      from: ADMIN,
      args: "someone",
      mentions: [],
    });
    expect(reply).toBe(
      "Reply to a message of the member, mention them, or give their user id: /kick <id>",
    );
    expect(transport.kickMember).not.toHaveBeenCalled();
  });

  it("lets any member kick themselves", async () => {
    const { service, transport, handlers } = setup();
    const reply = await handlers.onModerationCommand({
      chatId: "-100",
      command: "kickme",
      from: { id: 42, isBot: false, name: "Alice" },
      args: "",
      mentions: [],
    });
    expect(reply).toBe("Alice has been kicked.");
    expect(transport.isChatAdmin).not.toHaveBeenCalled();
    expect(transport.kickMember).toHaveBeenCalledWith({ groupId: "-100", memberId: "42" });
    expect(service.revokePass).toHaveBeenCalledWith({ groupId: "-100", memberId: "42" });
  });

  it("reports a removal Telegram refused", async () => {
    const { service, transport, handlers } = setup();
    transport.kickMember.mockRejectedValueOnce(new Error("user is an administrator"));
    const reply = await handlers.onModerationCommand({
      chatId: "-100",
      command: "kick",
      from: ADMIN,
      args: "42",
      mentions: [],
    });
    expect(reply).toBe("Could not kick 42.");
    expect(service.revokePass).not.toHaveBeenCalled();
  });

  it("stays quiet in groups outside the configured list", async () => {
    const { transport, handlers } = setup({ groups: [-100] });
    const reply = await handlers.onModerationCommand({
      chatId: "-200",
      command: "kickme",
      from: { id: 42, isBot: false },
      args: "",
      mentions: [],
    });
    expect(reply).toBeNull();
    expect(transport.kickMember).not.toHaveBeenCalled();
  });
});
