import { z } from 'zod';

export const AudioConfigSchema = z.object({
  sampleRate: z.number().int().positive().default(48000),
  channels: z.number().int().min(1).max(8).default(1),
  chunkSize: z.number().int().positive().default(4096),
  format: z.enum(['f32', 's16']).default('f32'),
  recordSeconds: z.number().positive().default(5),
  levelCheckSeconds: z.number().positive().default(0.1),
  inputFormat: z.string().min(1).default('alsa'),
  /** `{id}` is replaced with the numeric device index. */
  deviceTemplate: z.string().min(1).default('plughw:{id}'),
  ffmpegPath: z.string().min(1).default('ffmpeg'),
});

export const LevelConfigSchema = z.object({
  metric: z.enum(['peak', 'rms']).default('peak'),
  silenceThreshold: z.number().nonnegative().default(0.05),
  activityThreshold: z.number().nonnegative().default(0.1),
  activityWindow: z.number().int().positive().default(2),
  standbyWindow: z.number().int().positive().default(5),
}).refine(l => l.activityThreshold >= l.silenceThreshold, {
  message: 'activityThreshold must be >= silenceThreshold',
  path: ['activityThreshold'],
});

export const DetectionConfigSchema = z.object({
  consistencyChecks: z.number().int().positive().default(3),
  consistencyThreshold: z.number().int().positive().default(2),
  confidenceThreshold: z.number().min(0).max(1).default(0),
  checkDelaySeconds: z.number().nonnegative().default(1),
  cycleIntervalSeconds: z.number().nonnegative().default(3),
  standbyPollSeconds: z.number().nonnegative().default(0.5),
  aggressiveAfterMisses: z.number().int().positive().default(3),
  aggressiveCheckCount: z.number().int().nonnegative().default(3),
  aggressiveCheckIntervalSeconds: z.number().nonnegative().default(2),
  errorBackoffSeconds: z.number().nonnegative().default(1),
  maxReopenAttempts: z.number().int().nonnegative().default(5),
  recognitionTimeoutSeconds: z.number().positive().default(20),
  sinkTimeoutSeconds: z.number().positive().default(10),
}).refine(d => d.consistencyThreshold <= d.consistencyChecks, {
  message: 'consistencyThreshold must be <= consistencyChecks',
  path: ['consistencyThreshold'],
});

export const RecognitionConfigSchema = z.object({
  endpoint: z.string().url().default('https://api.audd.io/'),
  apiToken: z.string().min(1).optional(),
});

export const LastFmConfigSchema = z.object({
  apiKey: z.string().min(1),
  apiSecret: z.string().min(1),
  username: z.string().min(1),
  password: z.string().min(1),
});

export const ServerConfigSchema = z.object({
  port: z.number().int().min(0).max(65535).default(8000),
  authToken: z.string().min(1).optional(),
  listenerQueueSize: z.number().int().positive().default(32),
  rateLimitPerMinute: z.number().int().positive().default(30),
});

export const AppConfigSchema = z.object({
  audio: AudioConfigSchema.default({}),
  level: LevelConfigSchema.default({}),
  detection: DetectionConfigSchema.default({}),
  recognition: RecognitionConfigSchema.default({}),
  lastfm: LastFmConfigSchema.optional(),
  server: ServerConfigSchema.default({}),
  logging: z.object({
    verbose: z.boolean().default(false),
  }).default({}),
});

export type AudioConfig = z.infer<typeof AudioConfigSchema>;
export type LevelConfig = z.infer<typeof LevelConfigSchema>;
export type DetectionConfig = z.infer<typeof DetectionConfigSchema>;
export type RecognitionConfig = z.infer<typeof RecognitionConfigSchema>;
export type LastFmConfig = z.infer<typeof LastFmConfigSchema>;
export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type AppConfig = z.infer<typeof AppConfigSchema>;
