import { z } from "zod";

/** Artifact written by `convert`. */
export const OutputFormatSchema = z.enum(["ansi", "markdown", "text"]);

export type OutputFormat = z.infer<typeof OutputFormatSchema>;

/**
 * Message-of-the-day settings.
 */
export const MotdConfigSchema = z.object({
  /** Hours a post stays in the MOTD. 0 keeps it forever. */
  lifespan_hours: z.number().int().nonnegative().default(72),
  /** Show only the title block and first paragraph of a post */
  briefing: z.boolean().default(false),
  /** Text file shown above the post */
  header: z.string().optional(),
  /** Text file shown below the post */
  footer: z.string().optional(),
  /** Text file published verbatim once the post is stale */
  fallback: z.string().optional(),
  /** Base URL of the website; the post link is resolved against it */
  link_base: z.string().url().optional(),
});

export type MotdConfig = z.infer<typeof MotdConfigSchema>;

/**
 * Termpost configuration schema.
 * Stored in ~/.config/termpost/config.toml (user) and .termpost.toml (project)
 */
export const TermpostConfigSchema = z.object({
  /** Column width for wrapping. 0 disables wrapping. */
  wrap_width: z.number().int().nonnegative().default(80),
  /** Spaces in front of every non-blank MOTD line */
  indent: z.number().int().nonnegative().default(2),
  /** Extension of source documents */
  source_extension: z
    .string()
    .regex(/^\.[\w-]+$/, "must start with a dot, e.g. .md")
    .default(".md"),
  /** Default artifact for `convert` */
  format: OutputFormatSchema.default("ansi"),
  motd: MotdConfigSchema.default({}),
});

export type TermpostConfig = z.infer<typeof TermpostConfigSchema>;

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: TermpostConfig = TermpostConfigSchema.parse({});
