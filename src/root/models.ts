// Rollcall Root Models - response shapes of the Root member API

import { z } from 'zod';

export const streakSchema = z.object({
  currentStreak: z.number().int(),
  maxStreak: z.number().int(),
});

export const streakWithMemberIdSchema = streakSchema.extend({
  memberId: z.number().int(),
});

export const memberSchema = z.object({
  memberId: z.number().int(),
  name: z.string(),
  discordId: z.string(),
  groupId: z.number().int(),
  // Root holds at most one streak per member, but the list may be empty or missing.
  streak: z.array(streakSchema).nullish().transform((streak) => streak ?? []),
});

export const attendanceRecordSchema = z.object({
  name: z.string(),
  year: z.number().int(),
  isPresent: z.boolean(),
  timeIn: z.string().nullish().transform((timeIn) => timeIn ?? null),
});

export type Streak = z.infer<typeof streakSchema>;
export type StreakWithMemberId = z.infer<typeof streakWithMemberIdSchema>;
export type Member = z.infer<typeof memberSchema>;
export type AttendanceRecord = z.infer<typeof attendanceRecordSchema>;

export const membersResponseSchema = z.object({ members: z.array(memberSchema) });
export const streaksResponseSchema = z.object({ streaks: z.array(streakWithMemberIdSchema) });
export const incrementStreakResponseSchema = z.object({ incrementStreak: streakSchema });
export const resetStreakResponseSchema = z.object({ resetStreak: streakSchema });
export const attendanceResponseSchema = z.object({
  attendanceByDate: z.array(attendanceRecordSchema),
});

export const graphqlEnvelopeSchema = z.object({
  data: z.unknown().optional(),
  errors: z.array(z.object({ message: z.string() })).optional(),
});
