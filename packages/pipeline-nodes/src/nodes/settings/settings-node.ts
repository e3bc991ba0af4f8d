/**
 * Category Settings Node
 *
 * One instance per category. Its inputs are whatever the category's setting
 * folder describes; executing it only packages the chosen values.
 */
import type { CategoryKey, JsonObject, JsonValue } from '@asset-pipeline/channel-bus';
import { settingsLogger } from '@asset-pipeline/channel-bus';
import { BaseNode } from '../base-node.js';
import type { InputSchema, InputSpec, NodeMenuCategory, OutputType } from '../base-node.js';
import { scanSettings } from './schema-scanner.js';
import { settingDirFor } from './infra.js';

export const SETTING_MODES = ['Standard', 'Variant', 'Draft'] as const;

export type SettingsInputs = {
  mode: string;
  [param: string]: JsonValue;
};

/** Tagged record handed to the master controller */
export type SettingsRecord = {
  category: string;
  mode: string;
  params: JsonObject;
};

export type SettingsOutputs = { [categoryKey: string]: SettingsRecord };

/**
 * "05_SpecialEffects" → "SpecialEffects"
 */
export function categoryLabel(categoryKey: CategoryKey): string {
  return categoryKey.slice(categoryKey.indexOf('_') + 1);
}

export class CategorySettingsNode extends BaseNode<SettingsInputs, SettingsOutputs> {
  readonly nodeType: string;
  readonly displayName: string;
  readonly category: NodeMenuCategory = 'Universal_Pipeline/Setting';
  readonly returnTypes: readonly OutputType[] = ['DICT'];
  readonly returnNames: readonly string[];

  readonly categoryKey: CategoryKey;
  readonly settingDir: string;

  constructor(categoryKey: CategoryKey, settingsRoot: string) {
    super();
    this.categoryKey = categoryKey;
    this.settingDir = settingDirFor(settingsRoot, categoryKey);
    this.nodeType = `${categoryLabel(categoryKey)}SettingNode`;
    this.displayName = `${categoryKey} Setting`;
    this.returnNames = [categoryKey];
  }

  async inputTypes(): Promise<InputSchema> {
    const schema = await scanSettings(this.settingDir);
    const required: Record<string, InputSpec> = {
      mode: { type: 'COMBO', options: [...SETTING_MODES], default: SETTING_MODES[0] },
    };

    for (const parameter of schema.parameters) {
      if (parameter.name in required) {
        settingsLogger.warn(`${this.categoryKey}: parameter '${parameter.name}' clashes with a node input, skipped`);
        continue;
      }
      if (parameter.outcome === 'error') {
        settingsLogger.warn(`${this.categoryKey}: ${parameter.name} degraded to ${parameter.spec.type}`, parameter.reason);
      }
      required[parameter.name] = parameter.spec;
    }

    return { required };
  }

  protected async executeImpl(inputs: SettingsInputs): Promise<SettingsOutputs> {
    const { mode, ...params } = inputs;
    return {
      [this.categoryKey]: { category: this.categoryKey, mode, params },
    };
  }
}
