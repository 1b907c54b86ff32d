import type { z } from 'zod';
import type {
  SettingsSchema,
  StatusConfigSchema,
  StreamlinkConfigSchema,
  SupervisorConfigSchema,
  ViewerConfigSchema
} from '../schemas/viewer.js';

export type ViewerConfig = z.infer<typeof ViewerConfigSchema>;
export type ViewerConfigInput = z.input<typeof ViewerConfigSchema>;
export type StreamlinkConfig = z.infer<typeof StreamlinkConfigSchema>;
export type SupervisorConfig = z.infer<typeof SupervisorConfigSchema>;
export type StatusConfig = z.infer<typeof StatusConfigSchema>;
export type Settings = z.infer<typeof SettingsSchema>;
