import { z, ZodIssue } from "zod";
import { ConfigurationError } from "../lib/errors";

export const queueStyles = ["single", "multiple", "key_single", "key_multiple"] as const;
export const argumentStyles = ["single", "join", "auto", "array"] as const;
export const dequeueStyles = ["never", "always", "when_used", "by_key"] as const;

export type QueueStyle = (typeof queueStyles)[number];
export type ArgumentStyle = (typeof argumentStyles)[number];
export type DequeueStyle = (typeof dequeueStyles)[number];

export const isKeyedQueue = (style: QueueStyle) =>
  style === "key_single" || style === "key_multiple";

export const flashSettingsSchema = z
  .object({
    tokenName: z.string().min(1, "tokenName must not be empty.").default("flash"),
    sessionKey: z.string().min(1, "sessionKey must not be empty.").default("_flash"),
    queueStyle: z.enum(queueStyles).default("multiple"),
    argumentStyle: z.enum(argumentStyles).default("auto"),
    dequeueStyle: z.enum(dequeueStyles).default("when_used"),
    joinSeparator: z.string().default("")
  })
  .strict()
  .superRefine((settings, ctx) => {
    if (settings.dequeueStyle === "by_key" && !isKeyedQueue(settings.queueStyle)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["dequeueStyle"],
        message:
          "dequeue style 'by_key' is only available with 'key_single' or 'key_multiple' queue styles"
      });
    }
  });

export type FlashSettingsInput = z.input<typeof flashSettingsSchema>;
export type FlashSettings = z.output<typeof flashSettingsSchema>;

const describeIssue = (issue: ZodIssue) => {
  const field = issue.path.join(".");
  switch (issue.code) {
    case z.ZodIssueCode.unrecognized_keys:
      return `invalid configuration keys (${issue.keys.join(", ")})`;
    case z.ZodIssueCode.invalid_enum_value:
      return `invalid ${field} setting '${String(issue.received)}' (expected one of ${issue.options.join(", ")})`;
    case z.ZodIssueCode.custom:
      return issue.message;
    default:
      return field ? `${field}: ${issue.message}` : issue.message;
  }
};

export const parseFlashSettings = (input: unknown = {}): FlashSettings => {
  const result = flashSettingsSchema.safeParse(input ?? {});
  if (!result.success) {
    throw new ConfigurationError(result.error.issues.map(describeIssue));
  }
  return result.data;
};

const envVariables: Record<string, keyof FlashSettings> = {
  FLASH_TOKEN_NAME: "tokenName",
  FLASH_SESSION_KEY: "sessionKey",
  FLASH_QUEUE: "queueStyle",
  FLASH_ARGUMENTS: "argumentStyle",
  FLASH_DEQUEUE: "dequeueStyle",
  FLASH_JOIN_SEPARATOR: "joinSeparator"
};

/** Collects the FLASH_* variables that are set, unvalidated. Empty values fall back to the defaults. */
export const settingsFromEnv = (source: NodeJS.ProcessEnv): Record<string, string> => {
  const settings: Record<string, string> = {};
  for (const [variable, field] of Object.entries(envVariables)) {
    const value = source[variable];
    if (value) {
      settings[field] = value;
    }
  }
  return settings;
};
