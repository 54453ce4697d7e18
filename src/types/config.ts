/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const InputConfigSchema = z.object({
  encoding: z.enum(["utf-8", "utf8", "latin1", "ascii"]),
});

export const DocumentConfigSchema = z.object({
  // Wrap the body in \documentclass ... \end{document}
  standalone: z.boolean(),
  documentClass: z.string().min(1),
  packages: z.array(z.string()),
});

export const TranslationConfigSchema = z.object({
  // "comment" writes a visible % marker, "drop" writes nothing
  unknownDirectives: z.enum(["comment", "drop"]),
  // Where the inline latch is reset: after each span, before each directive, or never
  latchScope: z.enum(["span", "directive", "document"]),
  defaultListStyle: z.enum(["itemize", "enumerate"]),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
  showProgress: z.boolean(),
});

export const ConverterConfigSchema = z.object({
  input: InputConfigSchema,
  document: DocumentConfigSchema,
  translation: TranslationConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialConverterConfigSchema = z.object({
  input: InputConfigSchema.partial().optional(),
  document: DocumentConfigSchema.partial().optional(),
  translation: TranslationConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

// Infer TypeScript types from Zod schemas
export type InputConfig = z.infer<typeof InputConfigSchema>;
export type DocumentConfig = z.infer<typeof DocumentConfigSchema>;
export type TranslationConfig = z.infer<typeof TranslationConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type ConverterConfig = z.infer<typeof ConverterConfigSchema>;
export type PartialConverterConfig = z.infer<typeof PartialConverterConfigSchema>;
