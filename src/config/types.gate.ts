export type WrongAnswerPolicy = "repeat" | "reroll";
export type RemovalMode = "kick" | "ban";

export type GateConfig = {
  /** Wrong answers tolerated before the member is removed. */
  attempts?: number;
  /** Seconds a new member has to answer correctly. */
  timeoutSeconds?: number;
  /** Re-send the same question after a wrong answer, or pick another one. */
  onWrongAnswer?: WrongAnswerPolicy;
  /** "kick" lets the member join again later; "ban" does not. */
  removal?: RemovalMode;
  /** Extra removal attempts after a failed one (0 or 1). */
  removalRetries?: number;
  /** Seconds a removed member must wait before joining again. 0 lets them rejoin at once. */
  retryCooldownSeconds?: number;
  /** Path to the question bank JSON file. */
  questionsFile?: string;
  /** Group chat IDs to gate. Empty means every group the bot is in. */
  groups?: Array<string | number>;
  /** Delete "X joined the group" service messages. */
  deleteJoinMessages?: boolean;
  /** Delete "X left the group" service messages. */
  deleteLeaveMessages?: boolean;
  /** Keep gate records on disk so they survive a restart. */
  persist?: boolean;
};
