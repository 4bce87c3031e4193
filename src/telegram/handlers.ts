import type { Bot } from "grammy";
import type { User } from "grammy/types";
import type { GateConfig } from "../config/types.js";
import type { GateService } from "../gating/service.js";
import type { TelegramGateTransport } from "../gating/telegram.js";
import type { GateEventResult } from "../gating/types.js";
import type { SubsystemLogger } from "../logging.js";
import { describeError } from "../gating/errors.js";
import {
  buildChooseGroupText,
  buildModerationText,
  buildNoPendingText,
  MODERATION_USAGE_TEXT,
  UNAUTHORIZED_TEXT,
  type ModerationAction,
} from "../gating/messages.js";
import { createSubsystemLogger } from "../logging.js";

export type TelegramMember = {
  id: number;
  isBot: boolean;
  name?: string;
};

export type ModerationCommand = ModerationAction | "kickme";

export type ModerationRequest = {
  chatId: string;
  command: ModerationCommand;
  from: TelegramMember;
  /** Text after the command. */
  args: string;
  /** Author of the message the command replies to. */
  replyTo?: TelegramMember;
  /** Users linked through text_mention entities, in message order. */
  mentions: TelegramMember[];
};

export type GateUpdateHandlers = {
  onNewMembers: (params: {
    chatId: string;
    messageId: number;
    members: TelegramMember[];
  }) => Promise<GateEventResult[]>;
  onMemberLeft: (params: {
    chatId: string;
    messageId: number;
    member: TelegramMember;
  }) => Promise<GateEventResult | null>;
  onGroupText: (params: {
    chatId: string;
    fromId: number;
    text: string;
  }) => Promise<GateEventResult | null>;
  onPrivateText: (params: {
    fromId: number;
    text: string;
  }) => Promise<{ results: GateEventResult[]; reply?: string }>;
  onPrivateStart: (params: {
    fromId: number;
    payload?: string;
  }) => Promise<{ resent: number; reply?: string }>;
  onModerationCommand: (params: ModerationRequest) => Promise<string | null>;
};

export type GateUpdateHandlersParams = {
  service: GateService;
  transport: Pick<TelegramGateTransport, "deleteMessage" | "kickMember" | "banMember" | "isChatAdmin">;
  gate?: GateConfig;
  /** Used for the group links in replies to private messages. */
  botUsername?: string;
  log?: SubsystemLogger;
};

function isCommandText(text: string): boolean {
  return text.trimStart().startsWith("/");
}

function normalizeChatId(value: string | number): string {
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(Math.trunc(value));
  }
  return String(value).trim();
}

export function createGateUpdateHandlers(params: GateUpdateHandlersParams): GateUpdateHandlers {
  const { service, transport } = params;
  const gate = params.gate ?? {};
  const log = params.log ?? createSubsystemLogger("telegram");
  const allowedGroups = new Set((gate.groups ?? []).map((value) => normalizeChatId(value)));

  function isGatedGroup(chatId: string): boolean {
    return allowedGroups.size === 0 || allowedGroups.has(normalizeChatId(chatId));
  }

  async function deleteServiceMessage(chatId: string, messageId: number): Promise<void> {
    try {
      await transport.deleteMessage(chatId, messageId);
    } catch (err) {
      log.warn("failed to delete service message", {
        chatId,
        messageId,
        error: describeError(err),
      });
    }
  }

  async function onNewMembers(paramsJoin: {
    chatId: string;
    messageId: number;
    members: TelegramMember[];
  }): Promise<GateEventResult[]> {
    if (!isGatedGroup(paramsJoin.chatId)) {
      return [];
    }
    if (gate.deleteJoinMessages !== false) {
      await deleteServiceMessage(paramsJoin.chatId, paramsJoin.messageId);
    }
    const humans = paramsJoin.members.filter((member) => !member.isBot);
    return await Promise.all(
      humans.map((member) =>
        service.handleMemberJoined({
          groupId: paramsJoin.chatId,
          memberId: String(member.id),
        }),
      ),
    );
  }

  async function onMemberLeft(paramsLeft: {
    chatId: string;
    messageId: number;
    member: TelegramMember;
  }): Promise<GateEventResult | null> {
    if (!isGatedGroup(paramsLeft.chatId)) {
      return null;
    }
    if (gate.deleteLeaveMessages !== false) {
      await deleteServiceMessage(paramsLeft.chatId, paramsLeft.messageId);
    }
    if (paramsLeft.member.isBot) {
      return null;
    }
    return await service.handleMemberLeft({
      groupId: paramsLeft.chatId,
      memberId: String(paramsLeft.member.id),
    });
  }

  async function onGroupText(paramsText: {
    chatId: string;
    fromId: number;
    text: string;
  }): Promise<GateEventResult | null> {
    if (!isGatedGroup(paramsText.chatId) || isCommandText(paramsText.text)) {
      return null;
    }
    return await service.handleMessage({
      groupId: paramsText.chatId,
      memberId: String(paramsText.fromId),
      text: paramsText.text,
    });
  }

  async function onPrivateText(paramsText: {
    fromId: number;
    text: string;
  }): Promise<{ results: GateEventResult[]; reply?: string }> {
    if (isCommandText(paramsText.text)) {
      return { results: [] };
    }
    const memberId = String(paramsText.fromId);
    const results = await service.handleDirectMessage({ memberId, text: paramsText.text });
    if (!results.some((result) => result.reason === "ambiguous-target")) {
      return { results };
    }
    const groupIds = service
      .listRecords()
      .filter((record) => record.memberId === memberId && record.phase === "answering")
      .map((record) => record.groupId);
    return {
      results,
      reply: buildChooseGroupText({ groupIds, botUsername: params.botUsername }),
    };
  }

  // /start <groupId> focuses private answers on that group.
  async function onPrivateStart(paramsStart: {
    fromId: number;
    payload?: string;
  }): Promise<{ resent: number; reply?: string }> {
    const memberId = String(paramsStart.fromId);
    const groupId = paramsStart.payload?.trim() || undefined;
    let resent = await service.resendPrompts(memberId, groupId);
    if (resent === 0 && groupId !== undefined) {
      resent = await service.resendPrompts(memberId);
    }
    return resent === 0 ? { resent, reply: buildNoPendingText() } : { resent };
  }

  function resolveModerationTarget(request: ModerationRequest): TelegramMember | null {
    if (request.command === "kickme") {
      return request.from;
    }
    if (request.replyTo && !request.replyTo.isBot) {
      return request.replyTo;
    }
    const mentioned = request.mentions.find((member) => !member.isBot);
    if (mentioned) {
      return mentioned;
    }
    const id = request.args.trim().split(/\s+/)[0] ?? "";
    if (/^\d+$/.test(id)) {
      return { id: Number(id), isBot: false };
    }
    return null;
  }

  async function onModerationCommand(request: ModerationRequest): Promise<string | null> {
    if (!isGatedGroup(request.chatId) || request.from.isBot) {
      return null;
    }
    if (request.command !== "kickme") {
      let admin: boolean;
      try {
        admin = await transport.isChatAdmin(request.chatId, request.from.id);
      } catch (err) {
        log.warn("failed to check admin status", {
          chatId: request.chatId,
          userId: request.from.id,
          error: describeError(err),
        });
        return null;
      }
      if (!admin) {
        return UNAUTHORIZED_TEXT;
      }
    }
    const target = resolveModerationTarget(request);
    if (!target) {
      return MODERATION_USAGE_TEXT;
    }
    const action: ModerationAction = request.command === "ban" ? "ban" : "kick";
    const member = { groupId: request.chatId, memberId: String(target.id) };
    const label = target.name ?? String(target.id);
    try {
      await (action === "ban" ? transport.banMember(member) : transport.kickMember(member));
    } catch (err) {
      log.warn("moderation command failed", {
        chatId: request.chatId,
        userId: target.id,
        action,
        error: describeError(err),
      });
      return `Could not ${action} ${label}.`;
    }
    await service.revokePass(member);
    log.info("member removed by command", {
      chatId: request.chatId,
      userId: target.id,
      action,
      by: request.from.id,
    });
    return buildModerationText({ action, label });
  }

  return {
    onNewMembers,
    onMemberLeft,
    onGroupText,
    onPrivateText,
    onPrivateStart,
    onModerationCommand,
  };
}

function toTelegramMember(user: User): TelegramMember {
  return { id: user.id, isBot: user.is_bot, name: user.first_name };
}

export function registerGateHandlers(
  bot: Bot,
  handlers: GateUpdateHandlers,
  log: SubsystemLogger = createSubsystemLogger("telegram"),
): void {
  bot.on("message:new_chat_members", async (ctx) => {
    await handlers.onNewMembers({
      chatId: String(ctx.message.chat.id),
      messageId: ctx.message.message_id,
      members: ctx.message.new_chat_members.map((user) => ({ id: user.id, isBot: user.is_bot })),
    });
  });

  bot.on("message:left_chat_member", async (ctx) => {
    const user = ctx.message.left_chat_member;
    await handlers.onMemberLeft({
      chatId: String(ctx.message.chat.id),
      messageId: ctx.message.message_id,
      member: { id: user.id, isBot: user.is_bot },
    });
  });

  const privateChats = bot.chatType("private");
  privateChats.command("start", async (ctx) => {
    const from = ctx.from;
    if (!from) {
      return;
    }
    const { reply } = await handlers.onPrivateStart({ fromId: from.id, payload: ctx.match });
    if (reply) {
      await ctx.reply(reply);
    }
  });
  privateChats.on("message:text", async (ctx) => {
    const from = ctx.from;
    if (!from) {
      return;
    }
    const { reply } = await handlers.onPrivateText({ fromId: from.id, text: ctx.message.text });
    if (reply) {
      await ctx.reply(reply);
    }
  });

  const groupChats = bot.chatType(["group", "supergroup"]);
  const moderationCommands: ModerationCommand[] = ["kick", "ban", "kickme"];
  for (const command of moderationCommands) {
    groupChats.command(command, async (ctx) => {
      const from = ctx.from;
      if (!from) {
        return;
      }
      const replied = ctx.msg.reply_to_message?.from;
      const mentions = (ctx.msg.entities ?? []).flatMap((entity) =>
        entity.type === "text_mention" ? [toTelegramMember(entity.user)] : [],
      );
      const reply = await handlers.onModerationCommand({
        chatId: String(ctx.chat.id),
        command,
        from: toTelegramMember(from),
        args: ctx.match,
        replyTo: replied ? toTelegramMember(replied) : undefined,
        mentions,
      });
      if (reply) {
        await ctx.reply(reply);
      }
    });
  }

  groupChats.on("message:text", async (ctx) => {
    const from = ctx.from;
    if (!from || from.is_bot) {
      return;
    }
    await handlers.onGroupText({
      chatId: String(ctx.message.chat.id),
      fromId: from.id,
      text: ctx.message.text,
    });
  });

  bot.catch((err) => {
    log.error("telegram update failed", {
      updateId: err.ctx.update.update_id,
      error: describeError(err.error),
    });
  });
}
