import type { ChatPermissions } from "grammy/types";
import type { RemovalMode } from "../config/types.js";
import type { SubsystemLogger } from "../logging.js";
import type {
  GateMemberRef,
  GateNotice,
  GatePromptParams,
  GateRemovalOptions,
  GateTransport,
} from "./types.js";
import { createSubsystemLogger } from "../logging.js";
import { describeError } from "./errors.js";
import { buildStartFallbackText } from "./messages.js";

/** The part of grammy's `Api` the gate uses; `bot.api` satisfies it. */
export type TelegramGateApi = {
  restrictChatMember(
    chatId: number | string,
    userId: number,
    permissions: ChatPermissions,
  ): Promise<unknown>;
  banChatMember(
    chatId: number | string,
    userId: number,
    other?: { until_date?: number },
  ): Promise<unknown>;
  unbanChatMember(
    chatId: number | string,
    userId: number,
    other?: { only_if_banned?: boolean },
  ): Promise<unknown>;
  sendMessage(
    chatId: number | string,
    text: string,
    other?: { parse_mode?: "HTML" },
  ): Promise<unknown>;
  deleteMessage(chatId: number | string, messageId: number): Promise<unknown>;
  getChatMember(chatId: number | string, userId: number): Promise<{ status: string }>;
};

export type TelegramGateTransport = GateTransport & {
  notify: (notice: GateNotice) => Promise<void>;
  deleteMessage: (chatId: string, messageId: number) => Promise<void>;
  kickMember: (member: GateMemberRef) => Promise<void>;
  banMember: (member: GateMemberRef) => Promise<void>;
  isChatAdmin: (chatId: string, userId: number) => Promise<boolean>;
};

export type TelegramGateTransportParams = {
  api: TelegramGateApi;
  removal: RemovalMode;
  botUsername?: string;
  log?: SubsystemLogger;
};

const RESTRICTED_PERMISSIONS: ChatPermissions = {
  can_send_messages: false,
  can_send_audios: false,
  can_send_documents: false,
  can_send_photos: false,
  can_send_videos: false,
  can_send_video_notes: false,
  can_send_voice_notes: false,
  can_send_polls: false,
  can_send_other_messages: false,
  can_add_web_page_previews: false,
};

const MEMBER_PERMISSIONS: ChatPermissions = {
  can_send_messages: true,
  can_send_audios: true,
  can_send_documents: true,
  can_send_photos: true,
  can_send_videos: true,
  can_send_video_notes: true,
  can_send_voice_notes: true,
  can_send_polls: true,
  can_send_other_messages: true,
  can_add_web_page_previews: true,
};

export function toTelegramUserId(memberId: string): number {
  const userId = Number(memberId.trim());
  if (!Number.isSafeInteger(userId) || userId <= 0) {
    throw new Error(`Invalid Telegram user id: ${memberId}`);
  }
  return userId;
}

function escapeHtml(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

export function createTelegramGateTransport(
  params: TelegramGateTransportParams,
): TelegramGateTransport {
  const { api } = params;
  const log = params.log ?? createSubsystemLogger("telegram");

  async function restrictMember(member: GateMemberRef): Promise<void> {
    await api.restrictChatMember(
      member.groupId,
      toTelegramUserId(member.memberId),
      RESTRICTED_PERMISSIONS,
    );
  }

  async function unrestrictMember(member: GateMemberRef): Promise<void> {
    await api.restrictChatMember(
      member.groupId,
      toTelegramUserId(member.memberId),
      MEMBER_PERMISSIONS,
    );
  }

  async function kickMember(member: GateMemberRef): Promise<void> {
    const userId = toTelegramUserId(member.memberId);
    await api.banChatMember(member.groupId, userId);
    // Lift the ban right away so the member can join again later.
    await api.unbanChatMember(member.groupId, userId, { only_if_banned: true });
  }

  async function banMember(member: GateMemberRef): Promise<void> {
    await api.banChatMember(member.groupId, toTelegramUserId(member.memberId));
  }

  async function removeMember(member: GateMemberRef, options?: GateRemovalOptions): Promise<void> {
    if (params.removal === "ban") {
      await banMember(member);
      return;
    }
    if (options?.until) {
      // Telegram lifts the ban by itself at until_date.
      await api.banChatMember(member.groupId, toTelegramUserId(member.memberId), {
        until_date: Math.ceil(options.until.getTime() / 1000),
      });
      return;
    }
    await kickMember(member);
  }

  async function isChatAdmin(chatId: string, userId: number): Promise<boolean> {
    const member = await api.getChatMember(chatId, userId);
    return member.status === "administrator" || member.status === "creator";
  }

  async function sendPrompt(prompt: GatePromptParams): Promise<void> {
    const userId = toTelegramUserId(prompt.memberId);
    try {
      await api.sendMessage(userId, prompt.text);
      return;
    } catch (err) {
      log.debug("private prompt failed, falling back to group", {
        groupId: prompt.groupId,
        memberId: prompt.memberId,
        error: describeError(err),
      });
    }
    const mention = `<a href="tg://user?id=${userId}">${escapeHtml(prompt.memberId)}</a>`;
    const text = buildStartFallbackText({
      mention,
      groupId: prompt.groupId,
      botUsername: params.botUsername,
    });
    await api.sendMessage(prompt.groupId, text, { parse_mode: "HTML" });
  }

  async function notify(notice: GateNotice): Promise<void> {
    await api.sendMessage(toTelegramUserId(notice.memberId), notice.text);
  }

  async function deleteMessage(chatId: string, messageId: number): Promise<void> {
    await api.deleteMessage(chatId, messageId);
  }

  return {
    restrictMember,
    unrestrictMember,
    removeMember,
    sendPrompt,
    notify,
    deleteMessage,
    kickMember,
    banMember,
    isChatAdmin,
  };
}
