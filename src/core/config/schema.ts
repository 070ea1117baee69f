import { z } from 'zod';

/**
 * Helper to create an optional field with schema defaults.
 * Both undefined and null are treated as missing and replaced by {}.
 */
function withDefaults<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/** How the three registry insertions are committed. */
export const ApplyModeSchema = z.enum(['atomic', 'incremental']);

/** Route registry location and anchor literals. */
export const RegistrySettingsSchema = z.object({
  /** Registry file, relative to the project root */
  path: z.string().min(1).default('lib/core/router/app_router.dart'),
  /** Literal opening the constant container */
  container: z.string().min(1).default('class Router {'),
  /** Literal opening the route list */
  list_open: z.string().min(1).default('routes: ['),
  apply: ApplyModeSchema.default('atomic'),
});

/** Where generated files go. */
export const LayoutSettingsSchema = z.object({
  lib_dir: z.string().min(1).default('lib'),
  features_dir: z.string().min(1).default('lib/features'),
  shared_widgets_dir: z.string().min(1).default('lib/shared/widgets'),
  shared_providers_dir: z.string().min(1).default('lib/shared/providers'),
});

/** Defaults for `create project`. */
export const ProjectSettingsSchema = z.object({
  org: z.string().optional(),
  flutter_bin: z.string().min(1).default('flutter'),
});

export const ConfigSchema = z.object({
  registry: withDefaults(RegistrySettingsSchema),
  layout: withDefaults(LayoutSettingsSchema),
  project: withDefaults(ProjectSettingsSchema),
});

export type ApplyMode = z.infer<typeof ApplyModeSchema>;
export type RegistrySettings = z.infer<typeof RegistrySettingsSchema>;
export type LayoutSettings = z.infer<typeof LayoutSettingsSchema>;
export type ProjectSettings = z.infer<typeof ProjectSettingsSchema>;
export type Config = z.infer<typeof ConfigSchema>;
