/**
 * Rotation Configuration Service
 * Preset rotation sets trading search time for packing quality
 */
import { ConfigError } from '../errors/nesting.errors';

export interface RotationPreset {
  name: string;
  rotationCount: number;
}

/**
 * `count` angles evenly spaced over a full turn, starting at 0.
 */
export function evenlySpacedRotations(count: number): number[] {
  if (!Number.isInteger(count) || count < 1) {
    throw new ConfigError('rotationCount', `must be an integer >= 1 (got ${count})`);
  }
  return Array.from({ length: count }, (_, i) => (i * 360) / count);
}

export class RotationConfigService {
  /**
   * BASELINE: right angles only
   */
  static readonly PRESET_90_DEGREE: RotationPreset = { name: '90', rotationCount: 4 };

  static readonly PRESET_45_DEGREE: RotationPreset = { name: '45', rotationCount: 8 };

  static readonly PRESET_15_DEGREE: RotationPreset = { name: '15', rotationCount: 24 };

  static readonly PRESET_10_DEGREE: RotationPreset = { name: '10', rotationCount: 36 };

  /**
   * MAXIMUM QUALITY: 5° increments, slow on concave parts
   */
  static readonly PRESET_5_DEGREE: RotationPreset = { name: '5', rotationCount: 72 };

  static getAllPresets(): RotationPreset[] {
    return [
      this.PRESET_90_DEGREE,
      this.PRESET_45_DEGREE,
      this.PRESET_15_DEGREE,
      this.PRESET_10_DEGREE,
      this.PRESET_5_DEGREE,
    ];
  }

  static getPresetByName(name: string): RotationPreset | undefined {
    return this.getAllPresets().find(p => p.name === name);
  }
}
