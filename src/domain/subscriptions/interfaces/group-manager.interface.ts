/**
 * Group-management collaborator (chat platform)
 *
 * Called only after a committed transition, with at-least-once semantics:
 * implementations must tolerate repeated add/remove calls for the same user.
 */

export type GroupCallResult =
  | { ok: true }
  | { ok: false; transient: boolean; message: string; retryAfterMs?: number };

export interface GroupManager {
  readonly name: string;

  addMember(userId: string): Promise<GroupCallResult>;

  removeMember(userId: string): Promise<GroupCallResult>;
}
