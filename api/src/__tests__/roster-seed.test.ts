import fs from 'fs';
import os from 'os';
import path from 'path';
import { loadRosterSeed, parseRosterSeed } from '../config/roster-seed';
import { ErrorCode } from '../utils/errors';

const validActivity = {
  description: 'Learn strategies and compete in chess tournaments',
  schedule: 'Fridays, 3:30 PM - 5:00 PM',
  max_participants: 12,
  participants: ['michael@mergington.edu'],
};

describe('roster seed', () => {
  describe('loadRosterSeed', () => {
    it('loads the shipped activity file', () => {
      const roster = loadRosterSeed(path.resolve(__dirname, '../../data/activities.json'));

      expect(Object.keys(roster)).toHaveLength(9);
      expect(roster['Chess Club'].participants).toEqual(['michael@mergington.edu', 'daniel@mergington.edu']);
      expect(roster['Science Club']).toBeDefined();
      expect(roster['Programming Class']).toBeDefined();
      expect(roster['Basketball Club']).toBeDefined();
    });

    it('reports a missing file', () => {
      expect(() => loadRosterSeed(path.join(os.tmpdir(), 'no-such-roster.json'))).toThrow(
        /^Cannot read activity seed /
      );
    });

    it('reports invalid JSON', () => {
      const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'roster-seed-'));
      const file = path.join(dir, 'activities.json');
      fs.writeFileSync(file, '{ not json');

      try {
        expect(() => loadRosterSeed(file)).toThrow(`Activity seed ${file} is not valid JSON`);
      } finally {
        fs.rmSync(dir, { recursive: true, force: true });
      }
    });
  });

  describe('parseRosterSeed', () => {
    it('accepts a valid roster', () => {
      expect(parseRosterSeed({ 'Chess Club': validActivity })).toEqual({ 'Chess Club': validActivity });
    });

    it('rejects a non-object root', () => {
      expect(() => parseRosterSeed([validActivity])).toThrow(
        'Activity seed must be a JSON object keyed by activity name'
      );
    });

    it.each([
      [{ ...validActivity, description: 1 }, 'description must be a string'],
      [{ ...validActivity, schedule: null }, 'schedule must be a string'],
      [{ ...validActivity, max_participants: 0 }, 'max_participants must be a positive integer'],
      [{ ...validActivity, max_participants: 2.5 }, 'max_participants must be a positive integer'],
      [{ ...validActivity, participants: 'michael@mergington.edu' }, 'participants must be an array of strings'],
      [{ ...validActivity, participants: [42] }, 'participants must be an array of strings'],
      [
        { ...validActivity, participants: ['a@mergington.edu', 'a@mergington.edu'] },
        'duplicate participant a@mergington.edu',
      ],
      ['not a record', 'record must be an object'],
    ])('rejects %p', (record, reason) => {
      try {
        parseRosterSeed({ 'Chess Club': record });
        throw new Error('expected parseRosterSeed to throw');
      } catch (error) {
        expect(error).toMatchObject({
          code: ErrorCode.CONFIG_ERROR,
          message: `Invalid activity "Chess Club": ${reason}`,
        });
      }
    });
  });
});
