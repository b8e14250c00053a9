import { z } from 'zod';

/**
 * Older notebook clients post snake_case multipart fields; each alias is folded into its
 * camelCase field unless the camelCase field is present too.
 */
const withFieldAliases = (aliases: Readonly<Record<string, string>>) => {
  return (input: unknown): unknown => {
    if (input === null || typeof input !== 'object' || Array.isArray(input)) {
      return input;
    }

    const fields: Record<string, unknown> = { ...input };

    for (const [alias, field] of Object.entries(aliases)) {
      if (fields[field] === undefined && fields[alias] !== undefined) {
        fields[field] = fields[alias];
      }

      delete fields[alias];
    }

    return fields;
  };
};

const TRUE_FORM_VALUES = new Set(['true', '1', 'on', 'yes']);

export const booleanFieldSchema = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0', 'on', 'off', 'yes', 'no'])])
  .transform((value) => {
    return typeof value === 'boolean' ? value : TRUE_FORM_VALUES.has(value);
  });

export const scoreFieldSchema = z
  .union([
    z.number(),
    z
      .string()
      .trim()
      .regex(/^-?\d+(?:\.\d+)?$/, 'Expected a decimal number'),
  ])
  .transform((value) => {
    return typeof value === 'number' ? value : Number(value);
  });

export const activityIdSchema = z
  .string()
  .trim()
  .min(2)
  .max(96)
  .regex(/^[a-z0-9]+(?:[-_][a-z0-9]+)*$/, 'Expected a lowercase slug such as "python101"');
export const activityNameSchema = z.string().trim().min(1).max(200);
export const displayNameSchema = z.string().trim().min(1).max(200);
export const emailSchema = z.string().trim().toLowerCase().email().max(320);
export const userIdSchema = z.string().trim().min(1).max(128);
export const artifactRefSchema = z.string().trim().min(1).max(2048);
export const quizTokenSchema = z.string().trim().min(1).max(512);

export const activityPathParamsSchema = z.object({
  activityId: activityIdSchema,
});

export const submissionPathParamsSchema = activityPathParamsSchema.extend({
  userId: userIdSchema,
});

export const emailPathParamsSchema = z.object({
  email: emailSchema,
});

export const activityListQuerySchema = z.object({
  enabledOnly: booleanFieldSchema.optional(),
});

export const createActivityRequestSchema = z.preprocess(
  withFieldAliases({
    activity_id: 'activityId',
    activity_name: 'name',
    grading_artifact_ref: 'gradingArtifactRef',
  }),
  z.object({
    activityId: activityIdSchema,
    name: activityNameSchema,
    enabled: booleanFieldSchema.optional(),
    gradingArtifactRef: artifactRefSchema.optional(),
  }),
);

export const setActivityEnabledRequestSchema = z.object({
  enabled: booleanFieldSchema,
});

export const grantInstructorRequestSchema = z.object({
  email: emailSchema,
  name: displayNameSchema.optional(),
});

export const submitRequestSchema = z.preprocess(
  withFieldAliases({
    user: 'userId',
    user_id: 'userId',
    activity: 'activityId',
    activity_id: 'activityId',
    notebook_ref: 'notebookRef',
    prequiz_token: 'prequizToken',
    postquiz_token: 'postquizToken',
  }),
  z.object({
    userId: userIdSchema,
    name: displayNameSchema,
    activityId: activityIdSchema,
    notebookRef: artifactRefSchema,
    prequizToken: quizTokenSchema.optional(),
    postquizToken: quizTokenSchema.optional(),
  }),
);

export const setScoreRequestSchema = z.object({
  score: scoreFieldSchema,
});

const envFlagSchema = z.enum(['true', 'false']).transform((value) => value === 'true');

export const appConfigSchema = z
  .object({
    APP_ENV: z.string().trim().min(1).default('development'),
    PORT: z.coerce.number().int().min(1).max(65535).default(8100),
    DATABASE_URL: z.string().trim().min(1),
    IDENTITY_AUDIENCE: z.string().trim().min(1),
    IDENTITY_TOKENINFO_URL: z.string().url().default('https://oauth2.googleapis.com/tokeninfo'),
    IDENTITY_ALLOW_UNSIGNED_TOKENS: envFlagSchema.default('false'),
    OPEN_GRANT_BOOTSTRAP: envFlagSchema.default('false'),
    SCORE_MIN: z.coerce.number().finite().default(0),
    SCORE_MAX: z.coerce.number().finite().default(100),
    CORS_ALLOWED_ORIGINS: z.string().default('http://localhost:3000,http://localhost:8080'),
  })
  .superRefine((value, ctx) => {
    if (value.SCORE_MIN > value.SCORE_MAX) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['SCORE_MIN'],
        message: 'SCORE_MIN must not exceed SCORE_MAX',
      });
    }
  })
  .transform((value) => {
    return {
      appEnv: value.APP_ENV,
      port: value.PORT,
      databaseUrl: value.DATABASE_URL,
      identity: {
        audience: value.IDENTITY_AUDIENCE,
        tokenInfoUrl: value.IDENTITY_TOKENINFO_URL,
        allowUnsignedTokens: value.IDENTITY_ALLOW_UNSIGNED_TOKENS,
      },
      openGrantBootstrap: value.OPEN_GRANT_BOOTSTRAP,
      scoreRange: {
        min: value.SCORE_MIN,
        max: value.SCORE_MAX,
      },
      corsAllowedOrigins: value.CORS_ALLOWED_ORIGINS.split(',')
        .map((origin) => origin.trim())
        .filter((origin) => origin.length > 0),
    };
  });

export type ActivityPathParams = z.infer<typeof activityPathParamsSchema>;
export type SubmissionPathParams = z.infer<typeof submissionPathParamsSchema>;
export type EmailPathParams = z.infer<typeof emailPathParamsSchema>;
export type ActivityListQuery = z.infer<typeof activityListQuerySchema>;
export type CreateActivityRequest = z.infer<typeof createActivityRequestSchema>;
export type SetActivityEnabledRequest = z.infer<typeof setActivityEnabledRequestSchema>;
export type GrantInstructorRequest = z.infer<typeof grantInstructorRequestSchema>;
export type SubmitRequest = z.infer<typeof submitRequestSchema>;
export type SetScoreRequest = z.infer<typeof setScoreRequestSchema>;
export type AppConfig = z.infer<typeof appConfigSchema>;

export const parseActivityPathParams = (input: unknown): ActivityPathParams => {
  return activityPathParamsSchema.parse(input);
};

export const parseSubmissionPathParams = (input: unknown): SubmissionPathParams => {
  return submissionPathParamsSchema.parse(input);
};

export const parseEmailPathParams = (input: unknown): EmailPathParams => {
  return emailPathParamsSchema.parse(input);
};

export const parseActivityListQuery = (input: unknown): ActivityListQuery => {
  return activityListQuerySchema.parse(input);
};

export const parseCreateActivityRequest = (input: unknown): CreateActivityRequest => {
  return createActivityRequestSchema.parse(input);
};

export const parseSetActivityEnabledRequest = (input: unknown): SetActivityEnabledRequest => {
  return setActivityEnabledRequestSchema.parse(input);
};

export const parseGrantInstructorRequest = (input: unknown): GrantInstructorRequest => {
  return grantInstructorRequestSchema.parse(input);
};

export const parseSubmitRequest = (input: unknown): SubmitRequest => {
  return submitRequestSchema.parse(input);
};

export const parseSetScoreRequest = (input: unknown): SetScoreRequest => {
  return setScoreRequestSchema.parse(input);
};

export const parseAppConfig = (input: unknown): AppConfig => {
  return appConfigSchema.parse(input);
};
