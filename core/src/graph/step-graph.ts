import { ConfigurationErrorCode, createConfigurationError } from '../errors/index.js';
import type { StepDefinition } from '../steps/types.js';
import { computeTopologyLayers, type GraphEdge } from '../topology/index.js';

export interface StepGraph {
  /** Steps in declaration order. */
  readonly steps: readonly StepDefinition[];
  /** Stable topological order: by layer, then by declaration. */
  readonly order: readonly string[];
  readonly layers: readonly (readonly string[])[];
  step(id: string): StepDefinition;
  layerOf(id: string): number;
  /** Steps writing a key this step reads. */
  dependencies(id: string): readonly string[];
  /** Steps reading a key this step writes. */
  dependents(id: string): readonly string[];
  /** The gate's producer, the gate, and every step on a path between them, in order. */
  reworkScope(gateId: string): readonly string[];
  /** Shares its layer with another step and is not exclusive. */
  parallelEligible(id: string): boolean;
}

/**
 * Derives the dependency DAG from the steps' declared reads and writes and
 * checks the structural rules a run relies on. Every violation is a
 * configuration error raised here, never while a run is in progress.
 */
export function buildStepGraph(steps: readonly StepDefinition[]): StepGraph {
  if (steps.length === 0) {
    throw createConfigurationError(ConfigurationErrorCode.EMPTY_GRAPH, 'Step graph has no steps.');
  }

  const byId = new Map<string, StepDefinition>();
  for (const step of steps) {
    if (byId.has(step.id)) {
      throw createConfigurationError(
        ConfigurationErrorCode.DUPLICATE_STEP_ID,
        `Step id "${step.id}" is declared more than once.`,
      );
    }
    byId.set(step.id, step);
  }

  const writers = new Map<string, string>();
  for (const step of steps) {
    for (const key of step.writes) {
      const owner = writers.get(key.name);
      if (owner !== undefined) {
        throw createConfigurationError(
          ConfigurationErrorCode.DUPLICATE_WRITER,
          `Context key "${key.name}" is written by both ${owner} and ${step.id}.`,
          { suggestion: 'Each context key must have exactly one owning step.' },
        );
      }
      writers.set(key.name, step.id);
    }
  }

  const dependencies = new Map<string, string[]>();
  const dependents = new Map<string, string[]>();
  for (const step of steps) {
    dependencies.set(step.id, []);
    dependents.set(step.id, []);
  }

  const edges: GraphEdge[] = [];
  for (const step of steps) {
    for (const key of step.reads) {
      const writer = writers.get(key.name);
      if (writer === undefined) {
        throw createConfigurationError(
          ConfigurationErrorCode.MISSING_WRITER,
          `Step ${step.id} reads "${key.name}" but no step writes it.`,
        );
      }
      const upstream = dependencies.get(step.id) ?? [];
      if (!upstream.includes(writer)) {
        upstream.push(writer);
        dependents.get(writer)?.push(step.id);
        edges.push({ from: writer, to: step.id });
      }
    }
  }

  const { layerAssignments, layerCount } = computeTopologyLayers(steps, edges);
  const layerOf = (id: string): number => layerAssignments.get(id) ?? 0;

  const declarationIndex = new Map(steps.map((step, index) => [step.id, index]));
  const order = steps
    .map((step) => step.id)
    .sort(
      (a, b) =>
        layerOf(a) - layerOf(b) || (declarationIndex.get(a) ?? 0) - (declarationIndex.get(b) ?? 0),
    );
  const layers: string[][] = Array.from({ length: layerCount }, () => []);
  for (const id of order) {
    layers[layerOf(id)]?.push(id);
  }

  const ancestorCache = new Map<string, Set<string>>();
  const ancestorsOf = (id: string): Set<string> => {
    const cached = ancestorCache.get(id);
    if (cached) {
      return cached;
    }
    const result = new Set<string>();
    for (const parent of dependencies.get(id) ?? []) {
      result.add(parent);
      for (const ancestor of ancestorsOf(parent)) {
        result.add(ancestor);
      }
    }
    ancestorCache.set(id, result);
    return result;
  };

  const scopes = new Map<string, string[]>();
  for (const step of steps) {
    if (!step.gate) {
      continue;
    }
    const producer = step.gate.producer;
    if (!byId.has(producer) || !ancestorsOf(step.id).has(producer)) {
      throw createConfigurationError(
        ConfigurationErrorCode.UNKNOWN_GATE_PRODUCER,
        `Gate ${step.id} names producer "${producer}", which is not upstream of it.`,
        { suggestion: 'A gate must read at least one key its producer writes.' },
      );
    }
    const gateAncestors = ancestorsOf(step.id);
    scopes.set(
      step.id,
      order.filter(
        (id) =>
          id === producer ||
          id === step.id ||
          (gateAncestors.has(id) && ancestorsOf(id).has(producer)),
      ),
    );
  }

  // Consumers of reworkable output must wait for the gate, so a rework round
  // never invalidates a step that already ran on the rejected value.
  for (const [gateId, scope] of scopes) {
    const inScope = new Set(scope);
    for (const member of scope) {
      for (const reader of dependents.get(member) ?? []) {
        if (!inScope.has(reader) && !ancestorsOf(reader).has(gateId)) {
          throw createConfigurationError(
            ConfigurationErrorCode.UNGATED_CONSUMER,
            `Step ${reader} consumes output of ${member} without waiting for gate ${gateId}.`,
            { suggestion: `Make ${reader} read a key written by ${gateId}.` },
          );
        }
      }
    }
  }

  for (const step of steps) {
    if (step.optional) {
      continue;
    }
    const optionalParent = (dependencies.get(step.id) ?? []).find((id) => byId.get(id)?.optional);
    if (optionalParent !== undefined) {
      throw createConfigurationError(
        ConfigurationErrorCode.REQUIRED_DEPENDS_ON_OPTIONAL,
        `Required step ${step.id} depends on optional step ${optionalParent}.`,
        { suggestion: `Mark ${step.id} optional or make ${optionalParent} required.` },
      );
    }
  }

  const requireStep = (id: string): StepDefinition => {
    const step = byId.get(id);
    if (!step) {
      throw createConfigurationError(ConfigurationErrorCode.MISSING_WRITER, `Unknown step "${id}".`);
    }
    return step;
  };

  return {
    steps,
    order,
    layers,
    step: requireStep,
    layerOf,
    dependencies: (id) => dependencies.get(id) ?? [],
    dependents: (id) => dependents.get(id) ?? [],
    reworkScope(gateId) {
      const scope = scopes.get(gateId);
      if (!scope) {
        throw createConfigurationError(
          ConfigurationErrorCode.UNKNOWN_GATE_PRODUCER,
          `Step ${gateId} is not a quality gate.`,
        );
      }
      return scope;
    },
    parallelEligible(id) {
      const step = requireStep(id);
      return !step.exclusive && (layers[layerOf(id)]?.length ?? 0) > 1;
    },
  };
}
