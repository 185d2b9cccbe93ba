/**
 * 活动名单服务
 * 持有活动名 -> 活动记录的唯一数据源，只通过 list / signup / unregister 暴露
 *
 * 所有操作都是同步的：检查与修改之间没有 await，
 * 在单线程事件循环中不会与其他请求交错执行。
 * max_participants 只做展示，报名时不检查人数上限。
 */

import { logger } from '../utils/logger';

const log = logger.child('Service.Roster');

export interface Activity {
  description: string;
  schedule: string;
  max_participants: number;
  /** 报名邮箱，保持报名顺序，不重复 */
  participants: string[];
}

export type Roster = Record<string, Activity>;

export type RosterErrorCode = 'NOT_FOUND' | 'ALREADY_SIGNED_UP' | 'NOT_REGISTERED';

export type RosterResult =
  | { ok: true; message: string }
  | { ok: false; error: RosterErrorCode; message: string };

function copyActivity(activity: Activity): Activity {
  return { ...activity, participants: [...activity.participants] };
}

function copyEntries(entries: Iterable<[string, Activity]>): [string, Activity][] {
  return Array.from(entries, ([name, activity]): [string, Activity] => [name, copyActivity(activity)]);
}

export class RosterService {
  private readonly seed: Map<string, Activity>;
  private activities: Map<string, Activity>;

  constructor(seed: Roster) {
    this.seed = new Map(copyEntries(Object.entries(seed)));
    this.activities = this.cloneSeed();
  }

  private cloneSeed(): Map<string, Activity> {
    return new Map(copyEntries(this.seed));
  }

  get size(): number {
    return this.activities.size;
  }

  /**
   * 返回当前名单的快照，修改快照不影响服务内部状态
   */
  listActivities(): Roster {
    return Object.fromEntries(copyEntries(this.activities));
  }

  getActivity(activityName: string): Activity | undefined {
    const activity = this.activities.get(activityName);
    return activity ? copyActivity(activity) : undefined;
  }

  signup(activityName: string, email: string): RosterResult {
    const activity = this.activities.get(activityName);
    if (!activity) {
      return { ok: false, error: 'NOT_FOUND', message: 'Activity not found' };
    }

    if (activity.participants.includes(email)) {
      return {
        ok: false,
        error: 'ALREADY_SIGNED_UP',
        message: `Student is already signed up for ${activityName}`,
      };
    }

    activity.participants.push(email);
    log.info(`${email} 报名 ${activityName}`, {
      participants: activity.participants.length,
      maxParticipants: activity.max_participants,
    });

    return { ok: true, message: `Signed up ${email} for ${activityName}` };
  }

  unregister(activityName: string, email: string): RosterResult {
    const activity = this.activities.get(activityName);
    if (!activity) {
      return { ok: false, error: 'NOT_FOUND', message: 'Activity not found' };
    }

    const index = activity.participants.indexOf(email);
    if (index === -1) {
      return {
        ok: false,
        error: 'NOT_REGISTERED',
        message: `Student is not registered for ${activityName}`,
      };
    }

    activity.participants.splice(index, 1);
    log.info(`${email} 退出 ${activityName}`, { participants: activity.participants.length });

    return { ok: true, message: `Unregistered ${email} from ${activityName}` };
  }

  /**
   * 恢复为启动时的名单
   */
  reset(): void {
    this.activities = this.cloneSeed();
  }
}
