/**
 * @asset-pipeline/pipeline-nodes
 *
 * Settings, master controller, sender and receiver nodes over a shared
 * channel bus
 */

// Config
export { DEFAULT_CONFIG, resolveConfig } from './config.js';
export type {
  PipelineConfig,
  PipelineConfigOverrides,
  SenderConfig,
  ReceiverConfig,
  MasterConfig,
} from './config.js';

// Nodes
export { BaseNode } from './nodes/base-node.js';
export type {
  AnyNode,
  InputSchema,
  InputSpec,
  NodeError,
  NodeEvents,
  NodeInputs,
  NodeMenuCategory,
  NodeOutputs,
  OutputType,
  PipelineNode,
  TelemetryEvent,
} from './nodes/base-node.js';
export { CategorySettingsNode, SETTING_MODES, categoryLabel } from './nodes/settings/settings-node.js';
export type { SettingsInputs, SettingsOutputs, SettingsRecord } from './nodes/settings/settings-node.js';
export { ProjectMasterController } from './nodes/master-controller.js';
export type {
  MasterControllerInputs,
  MasterControllerOptions,
  MasterControllerOutputs,
} from './nodes/master-controller.js';
export { SenderNode, SENDER_NAME, SENDER_VERSION } from './nodes/sender.js';
export type { SenderInputs, SenderOptions, SenderOutputs } from './nodes/sender.js';
export {
  ReceiverNode,
  SlaveDistributor,
  REFERENCE_MODES,
  decomposeRecord,
  emptyCategories,
} from './nodes/receiver.js';
export type {
  CategoryOutputs,
  DecompositionMode,
  ReceiverInputs,
  ReceiverOptions,
  ReceiverOutputs,
  ReferenceMode,
} from './nodes/receiver.js';

// Settings folders
export {
  scanSettings,
  resolveParameter,
  readOrderList,
  readParameterConfig,
  listOptionEntries,
  CONFIG_ERROR_OPTION,
} from './nodes/settings/schema-scanner.js';
export type { ConfigRead, ParameterResolution, ParameterSchema } from './nodes/settings/schema-scanner.js';
export { initializeSettingsInfra, loadDefaultPresets, settingDirFor } from './nodes/settings/infra.js';
export type { SettingsPresets } from './nodes/settings/infra.js';

// Archive
export {
  ARCHIVE_DIR,
  ARCHIVE_INDEX_FILE,
  archiveRecord,
  ensureCategoryFolders,
  formatIndexLine,
  formatTimestamp,
  loadArchiveRecord,
  readArchiveIndex,
} from './archive/archive.js';
export type { ArchiveEntry, ArchiveLoadResult, ArchivedRecord } from './archive/archive.js';

// Registry
export { createNodeRegistry, registerDefaultNodes } from './registry/node-registry.js';
export type { NodeFactory, NodeRegistration, NodeRegistry, NodeRegistryState } from './registry/node-registry.js';

// === Factory Function ===

import type { ChannelBus } from '@asset-pipeline/channel-bus';
import { TypedEventEmitter, createChannelBus, nodeLogger, setGlobalLogLevel } from '@asset-pipeline/channel-bus';
import { resolveConfig } from './config.js';
import type { PipelineConfig, PipelineConfigOverrides } from './config.js';
import type { AnyNode, NodeEvents } from './nodes/base-node.js';
import { initializeSettingsInfra } from './nodes/settings/infra.js';
import { createNodeRegistry, registerDefaultNodes } from './registry/node-registry.js';
import type { NodeRegistry } from './registry/node-registry.js';

export interface CreatePipelineOptions extends PipelineConfigOverrides {
  /** Source of master record timestamps */
  clock?: () => Date;
}

export interface Pipeline {
  config: PipelineConfig;
  bus: ChannelBus;
  registry: NodeRegistry;
  /** Telemetry of every node created through createNode */
  events: TypedEventEmitter<NodeEvents>;
  createNode(nodeType: string): AnyNode;
  shutdown(): Promise<void>;
}

const FORWARDED_EVENTS = ['node:start', 'node:end', 'node:error'] as const;

/**
 * Create a pipeline: bus, registry with the default nodes and telemetry hub
 */
export async function createPipeline(options: CreatePipelineOptions = {}): Promise<Pipeline> {
  const { clock, ...overrides } = options;
  const config = resolveConfig(overrides);
  if (overrides.logLevel) {
    setGlobalLogLevel(overrides.logLevel);
  }

  const bus = await createChannelBus({ transport: config.transport, cacheDir: config.cacheDir });

  if (config.initializeInfra) {
    await initializeSettingsInfra(config.settingsRoot);
  }

  const registry = createNodeRegistry();
  registerDefaultNodes(registry, { bus, config, clock });

  const events = new TypedEventEmitter<NodeEvents>();
  nodeLogger.info(`Pipeline ready on ${config.transport} transport`, {
    nodes: registry.getState().list().length,
  });

  return {
    config,
    bus,
    registry,
    events,

    createNode(nodeType: string): AnyNode {
      const node = registry.getState().create(nodeType);
      for (const event of FORWARDED_EVENTS) {
        node.on(event, (payload) => events.emit(event, payload));
      }
      return node;
    },

    async shutdown(): Promise<void> {
      await bus.close();
      events.removeAllListeners();
    },
  };
}
