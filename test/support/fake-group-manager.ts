import { GroupCallResult, GroupManager } from '../../src/domain/subscriptions';

export interface GroupCall {
  action: 'add' | 'remove';
  userId: string;
}

/**
 * In-process group that records every call; scripted results are returned
 * first, then every call succeeds
 */
export class FakeGroupManager implements GroupManager {
  readonly name = 'fake';
  readonly calls: GroupCall[] = [];
  private readonly scripted: GroupCallResult[] = [];
  private readonly members = new Set<string>();

  respondWith(...results: GroupCallResult[]): void {
    this.scripted.push(...results);
  }

  async addMember(userId: string): Promise<GroupCallResult> {
    return this.apply({ action: 'add', userId });
  }

  async removeMember(userId: string): Promise<GroupCallResult> {
    return this.apply({ action: 'remove', userId });
  }

  isMember(userId: string): boolean {
    return this.members.has(userId);
  }

  reset(): void {
    this.calls.length = 0;
    this.scripted.length = 0;
    this.members.clear();
  }

  private apply(call: GroupCall): GroupCallResult {
    this.calls.push(call);
    const result = this.scripted.shift() ?? { ok: true };
    if (result.ok) {
      if (call.action === 'add') {
        this.members.add(call.userId);
      } else {
        this.members.delete(call.userId);
      }
    }
    return result;
  }
}
