/**
 * Base Node Interface
 *
 * Every pipeline node declares its input and output sockets to the host
 * runtime and exposes one entry point, execute(), that the host calls with
 * resolved inputs.
 *
 * Failure rules:
 * - Validation and integrity problems come back as a status/message pair
 * - Unrecoverable write failures are raised to the host
 */
import { TypedEventEmitter, PipelineError, errorMessage, nodeLogger } from '@asset-pipeline/channel-bus';

// ============ Socket Declarations ============

export type InputSpec =
  | { type: 'STRING'; default: string; multiline?: boolean }
  | { type: 'INT'; default: number; min: number; max: number; step: number }
  | { type: 'FLOAT'; default: number; min: number; max: number; step: number }
  | { type: 'COMBO'; options: string[]; default: string }
  | { type: 'DICT' };

export interface InputSchema {
  required: Record<string, InputSpec>;
  optional?: Record<string, InputSpec>;
}

export type OutputType = 'DICT' | 'STRING' | 'INT';

export type NodeMenuCategory =
  | 'Universal_Pipeline/Setting'
  | 'Universal_Pipeline/Management'
  | 'Universal_Pipeline/Distributed_Control';

// ============ Telemetry ============

export interface NodeError {
  /** Error code */
  code: string;

  /** Human-readable message */
  message: string;

  /** Whether the host can carry on with the rest of the graph */
  recoverable: boolean;
}

export interface TelemetryEvent {
  event_type: 'node_start' | 'node_end' | 'node_error';
  node_type: string;
  /** ISO timestamp of event */
  timestamp: string;
  latency_ms?: number;
  success: boolean;
  error?: NodeError;
}

export type NodeEvents = {
  'node:start': TelemetryEvent;
  'node:end': TelemetryEvent;
  'node:error': TelemetryEvent;
};

// ============ Node Interface ============

export type NodeInputs = Record<string, unknown>;
export type NodeOutputs = Record<string, unknown>;

export interface PipelineNode<TInputs extends NodeInputs, TOutputs extends NodeOutputs> {
  /** Registry key */
  readonly nodeType: string;

  /** Name shown in the host's node menu */
  readonly displayName: string;

  readonly category: NodeMenuCategory;

  /** Runs even when nothing consumes its outputs */
  readonly outputNode: boolean;

  readonly returnTypes: readonly OutputType[];
  readonly returnNames: readonly (keyof TOutputs & string)[];

  inputTypes(): Promise<InputSchema>;
  execute(inputs: TInputs): Promise<TOutputs>;

  /** Outputs in returnNames order, for hosts that take fixed-arity tuples */
  toTuple(outputs: TOutputs): unknown[];
}

// ============ Base Node Implementation ============

export abstract class BaseNode<TInputs extends NodeInputs, TOutputs extends NodeOutputs>
  extends TypedEventEmitter<NodeEvents>
  implements PipelineNode<TInputs, TOutputs>
{
  abstract readonly nodeType: string;
  abstract readonly displayName: string;
  abstract readonly category: NodeMenuCategory;
  abstract readonly returnTypes: readonly OutputType[];
  abstract readonly returnNames: readonly (keyof TOutputs & string)[];
  readonly outputNode: boolean = false;

  abstract inputTypes(): Promise<InputSchema>;

  /**
   * Main entry point - wraps executeImpl with timing, logging and telemetry
   */
  async execute(inputs: TInputs): Promise<TOutputs> {
    const startTime = Date.now();
    this.emit('node:start', this.telemetry('node_start', true));
    nodeLogger.debug(`${this.nodeType} started`);

    try {
      const outputs = await this.executeImpl(inputs);
      const latency = Date.now() - startTime;
      this.emit('node:end', { ...this.telemetry('node_end', true), latency_ms: latency });
      nodeLogger.debug(`${this.nodeType} finished in ${latency}ms`);
      return outputs;
    } catch (error) {
      const nodeError: NodeError = {
        code: error instanceof PipelineError ? error.code : 'NODE_EXECUTION_ERROR',
        message: errorMessage(error),
        recoverable: false,
      };
      this.emit('node:error', {
        ...this.telemetry('node_error', false),
        latency_ms: Date.now() - startTime,
        error: nodeError,
      });
      nodeLogger.error(`${this.nodeType} failed`, nodeError);
      throw error;
    }
  }

  toTuple(outputs: TOutputs): unknown[] {
    return this.returnNames.map((name) => outputs[name]);
  }

  /**
   * Node-specific implementation - override this in subclasses
   */
  protected abstract executeImpl(inputs: TInputs): Promise<TOutputs>;

  private telemetry(eventType: TelemetryEvent['event_type'], success: boolean): TelemetryEvent {
    return {
      event_type: eventType,
      node_type: this.nodeType,
      timestamp: new Date().toISOString(),
      success,
    };
  }
}

export type AnyNode = BaseNode<NodeInputs, NodeOutputs>;
