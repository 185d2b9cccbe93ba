/**
 * 活动初始名单
 * 启动时从 JSON 文件读取并校验，格式错误直接终止启动
 */

import fs from 'fs';
import { ErrorFactory } from '../utils/errors';
import type { Activity, Roster } from '../services/roster.service';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function invalid(name: string, reason: string): Error {
  return ErrorFactory.configError(`Invalid activity "${name}": ${reason}`, { activity: name });
}

function parseActivity(name: string, raw: unknown): Activity {
  if (!isRecord(raw)) {
    throw invalid(name, 'record must be an object');
  }

  const { description, schedule, max_participants, participants } = raw;

  if (typeof description !== 'string') {
    throw invalid(name, 'description must be a string');
  }
  if (typeof schedule !== 'string') {
    throw invalid(name, 'schedule must be a string');
  }
  if (typeof max_participants !== 'number' || !Number.isInteger(max_participants) || max_participants <= 0) {
    throw invalid(name, 'max_participants must be a positive integer');
  }
  if (!Array.isArray(participants)) {
    throw invalid(name, 'participants must be an array of strings');
  }

  const emails: string[] = [];
  for (const entry of participants) {
    if (typeof entry !== 'string') {
      throw invalid(name, 'participants must be an array of strings');
    }
    if (emails.includes(entry)) {
      throw invalid(name, `duplicate participant ${entry}`);
    }
    emails.push(entry);
  }

  return { description, schedule, max_participants, participants: emails };
}

/**
 * 校验已解析的 JSON，返回活动名单
 */
export function parseRosterSeed(raw: unknown): Roster {
  if (!isRecord(raw)) {
    throw ErrorFactory.configError('Activity seed must be a JSON object keyed by activity name');
  }

  // 活动名是任意字符串，用 fromEntries 建立自有属性
  return Object.fromEntries(
    Object.entries(raw).map(([name, record]): [string, Activity] => [name, parseActivity(name, record)])
  );
}

export function loadRosterSeed(filePath: string): Roster {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw ErrorFactory.configError(`Cannot read activity seed ${filePath}: ${reason}`, { filePath });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw ErrorFactory.configError(`Activity seed ${filePath} is not valid JSON: ${reason}`, { filePath });
  }

  return parseRosterSeed(raw);
}
