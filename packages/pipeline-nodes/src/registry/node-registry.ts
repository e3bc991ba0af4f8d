/**
 * Node Registry - node type → factory, display name
 *
 * Hosts discover nodes through this table. Kept in a vanilla store so a host
 * UI can subscribe to registrations.
 */

import { createStore } from 'zustand/vanilla';
import type { StoreApi } from 'zustand/vanilla';
import type { ChannelBus } from '@asset-pipeline/channel-bus';
import { CATEGORY_KEYS, PipelineError } from '@asset-pipeline/channel-bus';
import type { AnyNode } from '../nodes/base-node.js';
import { CategorySettingsNode } from '../nodes/settings/settings-node.js';
import { ProjectMasterController } from '../nodes/master-controller.js';
import { SenderNode } from '../nodes/sender.js';
import { ReceiverNode, SlaveDistributor } from '../nodes/receiver.js';
import type { PipelineConfig } from '../config.js';

export type NodeFactory = () => AnyNode;

export interface NodeRegistration {
  nodeType: string;
  displayName: string;
  factory: NodeFactory;
}

export interface NodeRegistryState {
  nodes: Map<string, NodeRegistration>;

  register: (nodeType: string, displayName: string, factory: NodeFactory) => void;
  unregister: (nodeType: string) => boolean;
  create: (nodeType: string) => AnyNode;
  has: (nodeType: string) => boolean;
  list: () => string[];
  displayNames: () => Record<string, string>;
}

export type NodeRegistry = StoreApi<NodeRegistryState>;

export function createNodeRegistry(): NodeRegistry {
  return createStore<NodeRegistryState>((set, get) => ({
    nodes: new Map(),

    register: (nodeType, displayName, factory) => {
      set((state) => {
        const nodes = new Map(state.nodes);
        nodes.set(nodeType, { nodeType, displayName, factory });
        return { nodes };
      });
    },

    unregister: (nodeType) => {
      if (!get().nodes.has(nodeType)) return false;

      set((state) => {
        const nodes = new Map(state.nodes);
        nodes.delete(nodeType);
        return { nodes };
      });
      return true;
    },

    create: (nodeType) => {
      const registration = get().nodes.get(nodeType);
      if (!registration) {
        throw new PipelineError('UNKNOWN_NODE_TYPE', `No node registered as '${nodeType}'`);
      }
      return registration.factory();
    },

    has: (nodeType) => get().nodes.has(nodeType),

    list: () => Array.from(get().nodes.keys()),

    displayNames: () => {
      const names: Record<string, string> = {};
      for (const [nodeType, registration] of get().nodes) {
        names[nodeType] = registration.displayName;
      }
      return names;
    },
  }));
}

export interface DefaultNodeOptions {
  bus: ChannelBus;
  config: PipelineConfig;
  clock?: () => Date;
}

function identify(node: AnyNode): [string, string] {
  return [node.nodeType, node.displayName];
}

/**
 * Register the six settings nodes, the master controller, the slave
 * distributor, the sender and the receiver
 */
export function registerDefaultNodes(registry: NodeRegistry, options: DefaultNodeOptions): void {
  const { bus, config, clock } = options;
  const { register } = registry.getState();

  const factories: NodeFactory[] = [
    ...CATEGORY_KEYS.map((key) => () => new CategorySettingsNode(key, config.settingsRoot)),
    () =>
      new ProjectMasterController({
        bus,
        defaults: config.master,
        defaultChannel: config.defaultChannel,
        clock,
      }),
    () => new SlaveDistributor({ bus, config: config.receiver, defaultChannel: config.defaultChannel }),
    () => new SenderNode({ bus, config: config.sender, defaultChannel: config.defaultChannel }),
    () => new ReceiverNode({ bus, config: config.receiver, defaultChannel: config.defaultChannel }),
  ];

  for (const factory of factories) {
    const [nodeType, displayName] = identify(factory());
    register(nodeType, displayName, factory);
  }
}
