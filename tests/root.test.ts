import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { RootClient } from '../src/root/client.js';
import { INCREMENT_STREAK_MUTATION } from '../src/root/queries.js';
import { silentLogger } from './helpers.js';

const ENDPOINT = 'http://root.test/graphql';

function jsonResponse(body: unknown, status = 200) {
  return {
    ok: status >= 200 && status < 300,
    status,
    json: async () => body,
  };
}

// -------------------------------------------------------
// RootClient
// -------------------------------------------------------
describe('RootClient', () => {
  const originalFetch = globalThis.fetch;
  let client: RootClient;

  beforeEach(() => {
    client = new RootClient({ url: ENDPOINT, timeoutMs: 5_000 }, silentLogger);
  });

  afterEach(() => {
    globalThis.fetch = originalFetch;
  });

  describe('successful requests', () => {
    it('should fetch members and default a missing streak to empty', async () => {
      globalThis.fetch = vi.fn().mockResolvedValue(
        jsonResponse({
          data: {
            members: [
              { memberId: 1, name: 'Asha', discordId: '111', groupId: 1, streak: [{ currentStreak: 2, maxStreak: 4 }] },
              { memberId: 2, name: 'Bala', discordId: '222', groupId: 2, streak: null },
            ],
          },
        }),
      );

      const members = await client.fetchMembers();

      expect(members).toEqual([
        { memberId: 1, name: 'Asha', discordId: '111', groupId: 1, streak: [{ currentStreak: 2, maxStreak: 4 }] },
        { memberId: 2, name: 'Bala', discordId: '222', groupId: 2, streak: [] },
      ]);
    });

    it('should POST the mutation with the member id', async () => {
      const mockFetch = vi.fn().mockResolvedValue(
        jsonResponse({ data: { incrementStreak: { currentStreak: 3, maxStreak: 3 } } }),
      );
      globalThis.fetch = mockFetch;

      const streak = await client.incrementStreak(7);

      expect(streak).toEqual({ currentStreak: 3, maxStreak: 3 });
      expect(mockFetch).toHaveBeenCalledTimes(1);
      const [url, init] = mockFetch.mock.calls[0];
      expect(url).toBe(ENDPOINT);
      expect(init.method).toBe('POST');
      expect(init.headers).toEqual({ 'Content-Type': 'application/json' });
      expect(JSON.parse(init.body)).toEqual({
        query: INCREMENT_STREAK_MUTATION,
        variables: { memberId: 7 },
      });
    });

    it('should return the streak after a reset', async () => {
      globalThis.fetch = vi.fn().mockResolvedValue(
        jsonResponse({ data: { resetStreak: { currentStreak: -1, maxStreak: 9 } } }),
      );
      await expect(client.resetStreak(3)).resolves.toEqual({ currentStreak: -1, maxStreak: 9 });
    });

    it('should fetch all streaks', async () => {
      globalThis.fetch = vi.fn().mockResolvedValue(
        jsonResponse({ data: { streaks: [{ memberId: 4, currentStreak: 0, maxStreak: 1 }] } }),
      );
      await expect(client.fetchStreaks()).resolves.toEqual([
        { memberId: 4, currentStreak: 0, maxStreak: 1 },
      ]);
    });

    it('should fetch attendance for a date and normalise a missing timeIn', async () => {
      const mockFetch = vi.fn().mockResolvedValue(
        jsonResponse({
          data: {
            attendanceByDate: [
              { name: 'Asha', year: 1, isPresent: true, timeIn: '17:30:00' },
              { name: 'Bala', year: 2, isPresent: false },
            ],
          },
        }),
      );
      globalThis.fetch = mockFetch;

      const records = await client.fetchAttendance('2026-10-19');

      expect(JSON.parse(mockFetch.mock.calls[0][1].body).variables).toEqual({ date: '2026-10-19' });
      expect(records).toEqual([
        { name: 'Asha', year: 1, isPresent: true, timeIn: '17:30:00' },
        { name: 'Bala', year: 2, isPresent: false, timeIn: null },
      ]);
    });
  });

  describe('failures', () => {
    it('should wrap network errors', async () => {
      globalThis.fetch = vi.fn().mockRejectedValue(new Error('connect ECONNREFUSED'));
      await expect(client.fetchMembers()).rejects.toThrow('[Root] Request failed: connect ECONNREFUSED');
    });

    it('should reject non-2xx responses', async () => {
      globalThis.fetch = vi.fn().mockResolvedValue(jsonResponse({}, 502));
      await expect(client.fetchMembers()).rejects.toThrow('[Root] Server responded with status 502');
    });

    it('should reject a body that is not JSON', async () => {
      globalThis.fetch = vi.fn().mockResolvedValue({
        ok: true,
        status: 200,
        json: async () => {
          throw new SyntaxError('Unexpected token <');
        },
      });
      await expect(client.fetchMembers()).rejects.toThrow(
        '[Root] Response is not valid JSON: Unexpected token <',
      );
    });

    it('should reject a body that is not a GraphQL response', async () => {
      globalThis.fetch = vi.fn().mockResolvedValue(jsonResponse([1, 2, 3]));
      await expect(client.fetchMembers()).rejects.toThrow(
        '[Root] Malformed response: not a GraphQL response',
      );
    });

    it('should surface GraphQL errors', async () => {
      globalThis.fetch = vi.fn().mockResolvedValue(
        jsonResponse({ errors: [{ message: 'member not found' }, { message: 'try again' }] }),
      );
      await expect(client.resetStreak(99)).rejects.toThrow(
        '[Root] GraphQL error: member not found; try again',
      );
    });

    it('should reject data of the wrong shape', async () => {
      globalThis.fetch = vi.fn().mockResolvedValue(
        jsonResponse({ data: { members: [{ memberId: 1, discordId: '111', groupId: 1 }] } }),
      );
      await expect(client.fetchMembers()).rejects.toThrow(
        '[Root] Malformed response: members.0.name: Required',
      );
    });
  });
});
