import { z } from 'zod';
import { ComponentsSchema, TierSchema } from '../schemas/snapshot';
import { ComponentStore } from '../engine/store';
import { renderPrompt } from '../engine/render';
import { validateComponents } from '../engine/validate';
import { MetricsTracker } from '../engine/metrics';
import presetData from './presets.json';

export const PresetSchema = z.object({
  name: z.string().regex(/^[a-z0-9_]+$/),
  title: z.string().min(1),
  tier: TierSchema,
  components: ComponentsSchema
});

export type Preset = z.infer<typeof PresetSchema>;

export interface PresetReport {
  name: string;
  title: string;
  tier: Preset['tier'];
  quality: number;
  successRate: number;
  length: number;
}

let cache: Preset[] | null = null;

export function listPresets(): Preset[] {
  if (!cache) cache = z.array(PresetSchema).parse(presetData);
  return cache;
}

export function getPreset(name: string): Preset | null {
  return listPresets().find(p => p.name === name) ?? null;
}

export function presetStore(preset: Preset): ComponentStore {
  return ComponentStore.fromComponents(preset.tier, preset.components);
}

/** Quality and success figures for every preset, as shown by `presets` without a name. */
export function reportPresets(presets: Preset[] = listPresets()): PresetReport[] {
  return presets.map(preset => {
    const store = presetStore(preset);
    const metrics = new MetricsTracker(store);
    return {
      name: preset.name,
      title: preset.title,
      tier: preset.tier,
      quality: validateComponents(store).overallScore,
      successRate: metrics.successRate,
      length: renderPrompt(store).length
    };
  });
}
