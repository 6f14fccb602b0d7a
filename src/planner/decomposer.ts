import { ConstructionError, ValidationError } from "../errors.js";
import { createLogger } from "../utils/logger.js";
import { validate } from "./task-graph.js";
import {
  COMPLEXITY_KEYWORDS,
  COMPLEXITY_THRESHOLDS,
  DEFAULT_TEMPLATES,
  FALLBACK_STEP,
  type DecompositionTemplate,
  type TemplateStep,
} from "./templates.js";
import { WORKER_ROLES, type Complexity, type DagSkeleton, type SubtaskSpec } from "./types.js";

const log = createLogger("decomposer");

export type GoalAnalysis = {
  taskType: string;
  complexity: Complexity;
  score: number;
};

export type DecomposeOptions = {
  /** Overrides the complexity derived from the goal text. */
  complexity?: Complexity;
  maxRetries?: number;
  timeoutMs?: number;
};

const ROLES = new Set<string>(WORKER_ROLES);

function mentions(text: string, word: string): boolean {
  const escaped = word.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
  return new RegExp(`\\b${escaped}\\b`).test(text);
}

/** Drop optional steps for simple goals, rewiring dependents onto the dropped step's own dependencies. */
function prune(steps: TemplateStep[], complexity: Complexity): TemplateStep[] {
  if (complexity !== "simple") return steps;
  const dropped = new Map(steps.filter((s) => s.optional).map((s) => [s.key, s]));
  if (dropped.size === 0) return steps;

  const resolve = (key: string, seen: Set<string>): string[] => {
    const step = dropped.get(key);
    if (!step) return [key];
    if (seen.has(key)) return [];
    seen.add(key);
    return step.dependsOn.flatMap((k) => resolve(k, seen));
  };

  return steps
    .filter((s) => !s.optional)
    .map((s) => ({ ...s, dependsOn: [...new Set(s.dependsOn.flatMap((k) => resolve(k, new Set())))] }));
}

/**
 * Maps a goal and a coarse task type to a DAG skeleton using named
 * templates. Unknown task types fall back to a single `execute` subtask.
 */
export class Decomposer {
  private templates = new Map<string, DecompositionTemplate>();

  constructor(templates: DecompositionTemplate[] = DEFAULT_TEMPLATES) {
    for (const template of templates) this.register(template);
  }

  register(template: DecompositionTemplate): void {
    if (this.templates.has(template.taskType)) {
      throw new ValidationError("DUPLICATE_REGISTRATION", `Template "${template.taskType}" already registered`);
    }
    this.templates.set(template.taskType, template);
  }

  taskTypes(): string[] {
    return [...this.templates.keys()];
  }

  analyze(goal: string): GoalAnalysis {
    const text = goal.toLowerCase();

    let score = 0;
    for (const { weight, words } of COMPLEXITY_KEYWORDS) {
      for (const word of words) {
        if (mentions(text, word)) score += weight;
      }
    }

    let complexity: Complexity = "simple";
    if (score >= COMPLEXITY_THRESHOLDS.complex) complexity = "complex";
    else if (score >= COMPLEXITY_THRESHOLDS.medium) complexity = "medium";

    const match = [...this.templates.values()].find((t) => t.keywords.some((k) => mentions(text, k)));
    return { taskType: match?.taskType ?? "development", complexity, score };
  }

  decompose(goal: string, taskTypeHint?: string, opts?: DecomposeOptions): DagSkeleton {
    const analysis = this.analyze(goal);
    const taskType = taskTypeHint?.trim().toLowerCase() || analysis.taskType;
    const complexity = opts?.complexity ?? analysis.complexity;
    const template = this.templates.get(taskType);

    if (!template) {
      log.info(`No template for task type "${taskType}", using a single subtask`);
    }

    const steps = template ? prune(template.steps, complexity) : [FALLBACK_STEP];
    const subtasks: SubtaskSpec[] = steps.map((step) => ({
      id: step.key,
      description: `${step.description}: ${goal}`,
      role: step.role,
      dependencies: [...step.dependsOn],
      priority: step.priority,
      maxRetries: opts?.maxRetries,
      timeoutMs: opts?.timeoutMs,
      inputPayload: { goal, step: step.key, taskType },
    }));

    const skeleton: DagSkeleton = { goal, taskType, complexity, subtasks };
    this.validate(skeleton);
    log.debug(`Decomposed goal into ${subtasks.length} subtasks`, { taskType, complexity });
    return skeleton;
  }

  /** Reject malformed skeletons before anything reaches the store. */
  validate(skeleton: DagSkeleton): void {
    if (skeleton.subtasks.length === 0) {
      throw new ConstructionError("EMPTY_GRAPH", "Skeleton has no subtasks");
    }
    for (const spec of skeleton.subtasks) {
      if (!ROLES.has(spec.role)) {
        throw new ConstructionError("INVALID_ROLE", `Subtask "${spec.id}" has unknown role "${spec.role}"`);
      }
    }
    validate(skeleton.subtasks);
  }
}
