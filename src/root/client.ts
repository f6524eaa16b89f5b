// Rollcall Root Client - GraphQL over HTTP POST to the Root member API

import type { z } from 'zod';
import type { Logger } from 'pino';
import type { RootConfig } from '../core/types.js';
import {
  attendanceResponseSchema,
  graphqlEnvelopeSchema,
  incrementStreakResponseSchema,
  membersResponseSchema,
  resetStreakResponseSchema,
  streaksResponseSchema,
  type AttendanceRecord,
  type Member,
  type Streak,
  type StreakWithMemberId,
} from './models.js';
import {
  ATTENDANCE_QUERY,
  INCREMENT_STREAK_MUTATION,
  MEMBERS_QUERY,
  RESET_STREAK_MUTATION,
  STREAKS_QUERY,
} from './queries.js';

export interface RootApi {
  fetchMembers(signal?: AbortSignal): Promise<Member[]>;
  fetchStreaks(signal?: AbortSignal): Promise<StreakWithMemberId[]>;
  incrementStreak(memberId: number, signal?: AbortSignal): Promise<Streak>;
  resetStreak(memberId: number, signal?: AbortSignal): Promise<Streak>;
  /** Attendance for a `YYYY-MM-DD` date. */
  fetchAttendance(date: string, signal?: AbortSignal): Promise<AttendanceRecord[]>;
}

/**
 * Every failure (network, HTTP status, GraphQL errors, unexpected shape)
 * surfaces as an Error whose message starts with `[Root]`.
 */
export class RootClient implements RootApi {
  private endpoint: string;
  private timeoutMs: number;
  private logger: Logger;

  constructor(config: RootConfig, logger: Logger) {
    this.endpoint = config.url;
    this.timeoutMs = config.timeoutMs;
    this.logger = logger.child({ component: 'root' });
  }

  async fetchMembers(signal?: AbortSignal): Promise<Member[]> {
    const data = await this.request(MEMBERS_QUERY, {}, membersResponseSchema, signal);
    return data.members;
  }

  async fetchStreaks(signal?: AbortSignal): Promise<StreakWithMemberId[]> {
    const data = await this.request(STREAKS_QUERY, {}, streaksResponseSchema, signal);
    return data.streaks;
  }

  async incrementStreak(memberId: number, signal?: AbortSignal): Promise<Streak> {
    const data = await this.request(
      INCREMENT_STREAK_MUTATION,
      { memberId },
      incrementStreakResponseSchema,
      signal,
    );
    return data.incrementStreak;
  }

  async resetStreak(memberId: number, signal?: AbortSignal): Promise<Streak> {
    const data = await this.request(
      RESET_STREAK_MUTATION,
      { memberId },
      resetStreakResponseSchema,
      signal,
    );
    return data.resetStreak;
  }

  async fetchAttendance(date: string, signal?: AbortSignal): Promise<AttendanceRecord[]> {
    const data = await this.request(ATTENDANCE_QUERY, { date }, attendanceResponseSchema, signal);
    return data.attendanceByDate;
  }

  private async request<T>(
    query: string,
    variables: Record<string, unknown>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    signal?: AbortSignal,
  ): Promise<T> {
    const timeout = AbortSignal.timeout(this.timeoutMs);
    const combined = signal ? AbortSignal.any([signal, timeout]) : timeout;

    this.logger.debug({ query, variables }, 'Sending request');

    let response: Response;
    try {
      response = await fetch(this.endpoint, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ query, variables }),
        signal: combined,
      });
    } catch (err) {
      throw new Error(`[Root] Request failed: ${err instanceof Error ? err.message : String(err)}`);
    }

    if (!response.ok) {
      throw new Error(`[Root] Server responded with status ${response.status}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      throw new Error(`[Root] Response is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
    }
    this.logger.debug({ body }, 'Received response');

    const envelope = graphqlEnvelopeSchema.safeParse(body);
    if (!envelope.success) {
      throw new Error('[Root] Malformed response: not a GraphQL response');
    }
    if (envelope.data.errors && envelope.data.errors.length > 0) {
      const messages = envelope.data.errors.map((error) => error.message).join('; ');
      throw new Error(`[Root] GraphQL error: ${messages}`);
    }

    const parsed = schema.safeParse(envelope.data.data);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new Error(`[Root] Malformed response: ${issues}`);
    }
    return parsed.data;
  }
}
