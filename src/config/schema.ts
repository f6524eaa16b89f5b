import { z } from 'zod';

function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

const snowflakeSchema = z.string().regex(/^\d{17,20}$/, 'Expected a Discord snowflake id');

// Channel ids may be left blank until the job that needs them is enabled.
const channelIdSchema = z.union([snowflakeSchema, z.literal('')]);

const scheduleTimeSchema = z.object({
  hour: z.number().int().min(0).max(23),
  minute: z.number().int().min(0).max(59),
});

const statusUpdateJobSchema = z.object({
  enabled: z.boolean(),
  runAt: scheduleTimeSchema,
  windowStart: scheduleTimeSchema,
  groupChannelIds: z.array(snowflakeSchema),
  reportChannelId: channelIdSchema,
  messageLimit: z.number().int().min(1).max(100),
  keywords: z.array(z.string().min(1)).min(1),
  specialAuthors: z.array(snowflakeSchema),
});

const labAttendanceJobSchema = z.object({
  enabled: z.boolean(),
  runAt: scheduleTimeSchema,
  lateAfter: scheduleTimeSchema,
  reportChannelId: channelIdSchema,
});

const schedulerConfigSchema = z.object({
  jobTimeoutMs: z.number().int().positive(),
  maxExecutionLogs: z.number().int().positive(),
});

const discordConfigSchema = z.object({
  botToken: z.string(),
  ownerId: snowflakeSchema.optional(),
});

const rootConfigSchema = z.object({
  url: z.union([z.string().url(), z.literal('')]),
  timeoutMs: z.number().int().positive(),
});

const loggingConfigSchema = z.object({
  environment: z.enum(['production', 'development']),
  enableDebugLibraries: z.boolean(),
  logFile: z.string().min(1),
});

export const rollcallConfigSchema = z.object({
  timeZone: z.string().refine(isValidTimeZone, { message: 'Unknown IANA time zone' }),
  discord: discordConfigSchema,
  root: rootConfigSchema,
  logging: loggingConfigSchema,
  scheduler: schedulerConfigSchema,
  jobs: z.object({
    statusUpdate: statusUpdateJobSchema,
    labAttendance: labAttendanceJobSchema,
  }),
});

/** Shape accepted from a `--config` JSON file: every field optional. */
export const rollcallFileConfigSchema = rollcallConfigSchema.deepPartial();

export type ValidatedConfig = z.infer<typeof rollcallConfigSchema>;
export type FileConfig = z.infer<typeof rollcallFileConfigSchema>;

export interface ConfigValidation {
  success: boolean;
  data?: ValidatedConfig;
  errors?: string[];
}

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(
    (issue) => `${issue.path.join('.')}: ${issue.message}`
  );
}

export function validateConfig(data: unknown): ConfigValidation {
  const result = rollcallConfigSchema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: formatIssues(result.error) };
}

/**
 * Settings the schema tolerates as blank (so `jobs` and `config --show`
 * work without secrets) but that a connected bot cannot run without.
 */
export function checkRuntimeSettings(config: ValidatedConfig): string[] {
  const errors: string[] = [];
  if (!config.root.url) {
    errors.push('root.url: ROOT_URL is required');
  }
  if (!config.discord.botToken) {
    errors.push('discord.botToken: DISCORD_TOKEN is required');
  }

  const { statusUpdate, labAttendance } = config.jobs;
  if (statusUpdate.enabled) {
    if (!statusUpdate.reportChannelId) {
      errors.push('jobs.statusUpdate.reportChannelId: required while the job is enabled');
    }
    if (statusUpdate.groupChannelIds.length === 0) {
      errors.push('jobs.statusUpdate.groupChannelIds: at least one channel is required while the job is enabled');
    }
  }
  if (labAttendance.enabled && !labAttendance.reportChannelId) {
    errors.push('jobs.labAttendance.reportChannelId: required while the job is enabled');
  }
  return errors;
}
