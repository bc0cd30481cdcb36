import { Storage } from '../../storage';
import type { ActivityLogInput, CheckInRepository } from '../checkInRepository';

const hour = 60 * 60 * 1000;

function activity(overrides: Partial<ActivityLogInput> = {}): ActivityLogInput {
  return {
    timestamp: 10 * hour,
    userResponse: 'worked on the report',
    activitySummary: 'Report writing',
    productivityType: 'aligned',
    alignmentScore: 8,
    matchedTodoId: null,
    category: 'Career',
    reasoning: 'On plan',
    checkInId: null,
    ...overrides,
  };
}

describe('CheckInRepository', () => {
  let storage: Storage;
  let checkIns: CheckInRepository;

  beforeEach(() => {
    storage = new Storage(':memory:');
    checkIns = storage.checkIns;
  });

  afterEach(() => {
    storage.close();
  });

  describe('user config', () => {
    it('should register a chat once with check-ins enabled', () => {
      expect(checkIns.ensureUserConfig(42, 1000)).toBe(true);
      expect(checkIns.ensureUserConfig(42, 2000)).toBe(false);

      expect(checkIns.getUserConfig(42)).toEqual({
        chatId: 42,
        checkInsEnabled: true,
        isSleeping: false,
        sleepStartTime: null,
        defaultWakeTime: '08:00',
        lastWakeTime: null,
        createdAt: 1000,
        updatedAt: 1000,
      });
    });

    it('should list only enabled chats', () => {
      checkIns.ensureUserConfig(1, 1000);
      checkIns.ensureUserConfig(2, 1000);
      checkIns.setCheckInsEnabled(1, false, 2000);

      expect(checkIns.listEnabledChats()).toEqual([2]);
    });

    it('should track sleep and wake times', () => {
      checkIns.ensureUserConfig(42, 1000);
      checkIns.markSleeping(42, 5000);
      expect(checkIns.getUserConfig(42)).toMatchObject({ isSleeping: true, sleepStartTime: 5000 });

      checkIns.markAwake(42, 9000);
      expect(checkIns.getUserConfig(42)).toMatchObject({ isSleeping: false, lastWakeTime: 9000 });
    });

    it('should store the default wake time', () => {
      checkIns.ensureUserConfig(42, 1000);
      checkIns.setDefaultWakeTime(42, '06:45', 2000);

      expect(checkIns.getUserConfig(42)?.defaultWakeTime).toBe('06:45');
    });
  });

  describe('check-ins', () => {
    it('should return the newest sent check-in of a chat', () => {
      checkIns.createCheckIn(42, 1 * hour, 'sent');
      const latest = checkIns.createCheckIn(42, 2 * hour, 'sent');
      checkIns.createCheckIn(7, 3 * hour, 'sent');
      checkIns.createCheckIn(42, 3 * hour, 'sleeping');

      expect(checkIns.getLatestSentCheckIn(42)?.id).toBe(latest);
      expect(checkIns.getLatestSentCheckIn(99)).toBeNull();
    });

    it('should only set sent time for sent check-ins', () => {
      const sent = checkIns.createCheckIn(42, hour, 'sent', 2);
      const missed = checkIns.createCheckIn(42, hour, 'missed');

      expect(checkIns.getCheckIn(sent)).toMatchObject({ sentTime: hour, retryCount: 2, status: 'sent' });
      expect(checkIns.getCheckIn(missed)?.sentTime).toBeNull();
    });

    it('should keep the response time when none is given', () => {
      const id = checkIns.createCheckIn(42, hour, 'sent');
      checkIns.setCheckInStatus(id, 'completed', 2 * hour);
      checkIns.setCheckInStatus(id, 'sleeping');

      expect(checkIns.getCheckIn(id)).toMatchObject({ status: 'sleeping', responseTime: 2 * hour });
    });

    it('should mark old unanswered check-ins as missed', () => {
      const old = checkIns.createCheckIn(42, 1 * hour, 'sent');
      const fresh = checkIns.createCheckIn(42, 3 * hour, 'sent');

      expect(checkIns.markStaleAsMissed(2 * hour)).toBe(1);
      expect(checkIns.getCheckIn(old)?.status).toBe('missed');
      expect(checkIns.getCheckIn(fresh)?.status).toBe('sent');
    });

    it('should turn open check-ins in a range into sleeping ones', () => {
      const missed = checkIns.createCheckIn(42, 1 * hour, 'missed');
      const answered = checkIns.createCheckIn(42, 2 * hour, 'completed');
      const sent = checkIns.createCheckIn(42, 3 * hour, 'sent');
      const outside = checkIns.createCheckIn(42, 9 * hour, 'missed');
      const otherChat = checkIns.createCheckIn(7, 2 * hour, 'missed');

      const sleeping = checkIns.markRangeAsSleeping(42, 0, 5 * hour);

      expect(sleeping.map((c) => c.id)).toEqual([missed, sent]);
      expect(checkIns.getCheckIn(answered)?.status).toBe('completed');
      expect(checkIns.getCheckIn(outside)?.status).toBe('missed');
      expect(checkIns.getCheckIn(otherChat)?.status).toBe('missed');
    });
  });

  describe('activity logs and statistics', () => {
    it('should report whether a check-in has a log', () => {
      const id = checkIns.createCheckIn(42, hour, 'sent');
      expect(checkIns.checkHasActivityLog(id)).toBe(false);

      checkIns.insertActivityLog(activity({ checkInId: id }), hour);
      expect(checkIns.checkHasActivityLog(id)).toBe(true);
    });

    it('should aggregate activities over a time range', () => {
      checkIns.insertActivityLog(activity({ alignmentScore: 8, category: 'Career' }));
      checkIns.insertActivityLog(activity({ productivityType: 'beneficial', alignmentScore: 4, category: 'Fitness' }));
      checkIns.insertActivityLog(activity({ productivityType: 'aligned', alignmentScore: 6, category: 'Career' }));
      checkIns.insertActivityLog(activity({ productivityType: 'sleeping', alignmentScore: 0, category: 'Sleep' }));
      checkIns.insertActivityLog(activity({ timestamp: 100 * hour, alignmentScore: 1 }));

      const from = 0;
      const to = 24 * hour;
      expect(checkIns.countActivitiesByType(from, to)).toEqual(expect.arrayContaining([
        { key: 'aligned', count: 2 },
        { key: 'beneficial', count: 1 },
        { key: 'sleeping', count: 1 },
      ]));
      expect(checkIns.averageAlignmentScore(from, to)).toBe(6);
      expect(checkIns.categoryBreakdown(from, to)).toEqual([
        { key: 'Career', count: 2 },
        { key: 'Fitness', count: 1 },
      ]);
    });

    it('should return null average when nothing was logged', () => {
      expect(checkIns.averageAlignmentScore(0, hour)).toBeNull();
    });

    it('should count check-ins by status', () => {
      checkIns.createCheckIn(42, hour, 'completed');
      checkIns.createCheckIn(42, 2 * hour, 'completed');
      checkIns.createCheckIn(42, 3 * hour, 'missed');

      expect(checkIns.countCheckInsByStatus(0, 24 * hour)).toEqual(expect.arrayContaining([
        { key: 'completed', count: 2 },
        { key: 'missed', count: 1 },
      ]));
    });
  });
});
