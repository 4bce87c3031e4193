import type { GateNotice, Question } from "./types.js";

function formatRemaining(ms: number): string {
  const totalSeconds = Math.max(0, Math.ceil(ms / 1000));
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  if (minutes === 0) {
    return `${seconds}s`;
  }
  return seconds === 0 ? `${minutes} min` : `${minutes} min ${seconds}s`;
}

export function buildPromptText(params: {
  question: Question;
  attemptsRemaining: number;
  deadline: string;
  retry: boolean;
  now: Date;
}): string {
  const remainingMs = Date.parse(params.deadline) - params.now.getTime();
  const attemptsLabel =
    params.attemptsRemaining === 1 ? "1 attempt left" : `${params.attemptsRemaining} attempts left`;
  const lines = [
    params.retry
      ? "That answer is not correct. Try again."
      : "Welcome! Before you can chat in this group, please answer a question.",
    "",
    params.question.prompt,
    "",
    `${attemptsLabel}, ${formatRemaining(remainingMs)} to answer.`,
  ];
  return lines.join("\n");
}

export function buildOutcomeText(
  outcome: GateNotice["outcome"],
  options: { removed?: boolean; retryAfterMs?: number } = {},
): string {
  if (outcome === "passed") {
    return "Correct! You can now chat in the group.";
  }
  if (options.removed === false) {
    // Removal failed: the member is still in the group, muted.
    switch (outcome) {
      case "failed":
        return "Unfortunately that was your last attempt. You stay muted in the group until an admin lets you in.";
      case "timed-out":
        return "Time is up. You stay muted in the group until an admin lets you in.";
      case "unknown-question":
        return "Your question is no longer available. You stay muted in the group until an admin lets you in.";
    }
  }
  const retry =
    options.retryAfterMs && options.retryAfterMs > 0
      ? ` You can join again in ${formatRemaining(options.retryAfterMs)}.`
      : "";
  switch (outcome) {
    case "failed":
      return `Unfortunately that was your last attempt. You have been removed from the group.${retry}`;
    case "timed-out":
      return `Time is up. You have been removed from the group.${retry}`;
    case "unknown-question":
      return "Your question is no longer available. You have been removed from the group; please join again.";
  }
}

function startLink(botUsername: string, groupId: string): string {
  return `https://t.me/${botUsername}?start=${encodeURIComponent(groupId)}`;
}

export function buildStartFallbackText(params: {
  mention: string;
  groupId: string;
  botUsername?: string;
}): string {
  const link = params.botUsername ? ` ${startLink(params.botUsername, params.groupId)}` : "";
  return `${params.mention}, please open a private chat with me to answer your entry question:${link}`;
}

export function buildChooseGroupText(params: { groupIds: string[]; botUsername?: string }): string {
  const { botUsername } = params;
  const choices = params.groupIds.map((groupId) =>
    botUsername ? startLink(botUsername, groupId) : `/start ${groupId}`,
  );
  return [
    "You have entry questions waiting in more than one group, and that answer does not match any of them.",
    "Choose the group you are answering for:",
    ...choices,
  ].join("\n");
}

export function buildNoPendingText(): string {
  return "You have no pending entry questions.";
}

export type ModerationAction = "kick" | "ban";

export function buildModerationText(params: { action: ModerationAction; label: string }): string {
  return params.action === "ban"
    ? `${params.label} has been banned.`
    : `${params.label} has been kicked.`;
}

export const MODERATION_USAGE_TEXT =
  "Reply to a message of the member, mention them, or give their user id: /kick <id>";

export const UNAUTHORIZED_TEXT = "Only group admins can use this command.";
