import { z } from 'zod';

const DEFAULT_USER_AGENT = 'Mozilla/5.0 (Windows NT 10.0; rv:128.0) Gecko/20100101 Firefox/128.0';

const ReferenceSchema = z.string().regex(/^[@#]?[^@\s]+@[^@\s]+$/, 'expected <name>@<instance>');

export const ConfigSchema = z.object({
  logging: z.object({
    level: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info')
  }).default({}),
  http: z.object({
    proxy: z.string().url().optional(),
    timeoutSeconds: z.number().positive().max(600).default(60),
    userAgent: z.string().min(1).default(DEFAULT_USER_AGENT)
  }).default({}),
  timeline: z.object({
    limit: z.number().int().min(1).max(80).default(40),
    // seed: a never-seen source records its current posts without mailing them
    firstRunPolicy: z.enum(['seed', 'notify']).default('seed'),
    resolveOriginal: z.boolean().default(true),
    // how many unseen ancestors of a reply are mailed ahead of it; 0 disables
    parentDepth: z.number().int().min(0).max(10).default(3),
    pauseBetweenSourcesMs: z.object({
      min: z.number().int().min(0).default(3000),
      max: z.number().int().min(0).default(10000)
    }).default({}).refine(pause => pause.min <= pause.max, 'min must not exceed max')
  }).default({}),
  state: z.object({
    filePath: z.string().min(1),
    lockFilePath: z.string().min(1),
    flushEachPost: z.boolean().default(true),
    retainPerSource: z.number().int().min(0).default(0) // 0 = keep everything
  }),
  images: z.object({
    maxWidth: z.number().int().positive().optional(),
    maxHeight: z.number().int().positive().optional(),
    placeholderOnDownloadError: z.boolean().default(true)
  }).default({}),
  mail: z.object({
    from: z.string().email(),
    recipient: z.string().email(),
    host: z.string().min(1),
    port: z.number().int().min(1).max(65535),
    secure: z.boolean().default(false),
    maximumSubjectLength: z.number().int().min(2).max(998).default(75),
    timeoutSeconds: z.number().positive().max(600).default(60),
    attachUnsupportedMedia: z.boolean().default(false),
    hostname: z.string().min(1).optional() // right-hand side of Message-ID, defaults to os.hostname()
  }),
  contentReplacements: z.array(z.object({
    pattern: z.string().min(1),
    replacement: z.string()
  })).default([]),
  accounts: z.array(z.object({
    handle: ReferenceSchema,
    flags: z.array(z.enum(['noboosts', 'noreplies'])).default([])
  })).default([]),
  hashtags: z.array(ReferenceSchema).default([]),
  metrics: z.object({
    textfilePath: z.string().min(1).optional()
  }).default({})
}).superRefine((config, ctx) => {
  const { retainPerSource } = config.state;
  if (retainPerSource > 0 && retainPerSource < config.timeline.limit) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['state', 'retainPerSource'],
      message: `must be 0 or at least timeline.limit (${config.timeline.limit})`
    });
  }
});

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;
