import type { Complexity, WorkerRole } from "./types.js";

export const PRIORITY = { high: 3, medium: 2, low: 1 } as const;

export type TemplateStep = {
  /** Becomes the subtask id, so it must be unique within the template. */
  key: string;
  role: WorkerRole;
  description: string;
  dependsOn: string[];
  priority: number;
  /** Dropped for simple goals; its dependents inherit its dependencies. */
  optional?: boolean;
};

export type DecompositionTemplate = {
  taskType: string;
  /** Goal keywords (lowercase) that classify a goal as this type. */
  keywords: string[];
  steps: TemplateStep[];
};

export const DEVELOPMENT: DecompositionTemplate = {
  taskType: "development",
  keywords: ["develop", "build", "implement", "create", "add", "feature"],
  steps: [
    {
      key: "research",
      role: "researcher",
      description: "Research technical approaches and best practices",
      dependsOn: [],
      priority: PRIORITY.high,
      optional: true,
    },
    {
      key: "design",
      role: "coder",
      description: "Design the system architecture and data model",
      dependsOn: ["research"],
      priority: PRIORITY.high,
    },
    {
      key: "implement",
      role: "coder",
      description: "Implement the core functionality",
      dependsOn: ["design"],
      priority: PRIORITY.high,
    },
    {
      key: "test",
      role: "tester",
      description: "Write unit and integration tests",
      dependsOn: ["implement"],
      priority: PRIORITY.medium,
    },
    {
      key: "document",
      role: "writer",
      description: "Write API documentation and usage notes",
      dependsOn: ["implement"],
      priority: PRIORITY.medium,
    },
    {
      key: "review",
      role: "reviewer",
      description: "Review the code and check quality",
      dependsOn: ["test", "document"],
      priority: PRIORITY.medium,
    },
  ],
};

export const REFACTOR: DecompositionTemplate = {
  taskType: "refactor",
  keywords: ["refactor", "restructure", "clean up", "cleanup", "rewrite"],
  steps: [
    { key: "analyze", role: "researcher", description: "Analyze the existing code structure", dependsOn: [], priority: PRIORITY.high },
    { key: "plan", role: "coder", description: "Design the refactoring plan", dependsOn: ["analyze"], priority: PRIORITY.high },
    { key: "refactor", role: "coder", description: "Carry out the refactoring", dependsOn: ["plan"], priority: PRIORITY.high },
    { key: "verify", role: "tester", description: "Verify behaviour is unchanged", dependsOn: ["refactor"], priority: PRIORITY.medium },
  ],
};

export const TEST: DecompositionTemplate = {
  taskType: "test",
  keywords: ["test", "coverage", "qa"],
  steps: [
    { key: "analyze", role: "researcher", description: "Analyze the testing requirements", dependsOn: [], priority: PRIORITY.high },
    { key: "write-tests", role: "tester", description: "Write the test cases", dependsOn: ["analyze"], priority: PRIORITY.high },
    { key: "run-tests", role: "tester", description: "Run the tests and produce a report", dependsOn: ["write-tests"], priority: PRIORITY.medium },
  ],
};

export const DOCS: DecompositionTemplate = {
  taskType: "docs",
  keywords: ["document", "documentation", "docs", "readme", "guide"],
  steps: [
    { key: "research", role: "researcher", description: "Collect the material to document", dependsOn: [], priority: PRIORITY.high },
    { key: "draft", role: "writer", description: "Draft the documentation", dependsOn: ["research"], priority: PRIORITY.high },
    { key: "review", role: "reviewer", description: "Review the documentation for accuracy", dependsOn: ["draft"], priority: PRIORITY.medium },
  ],
};

export const RESEARCH: DecompositionTemplate = {
  taskType: "research",
  keywords: ["research", "investigate", "survey", "compare", "evaluate"],
  steps: [
    { key: "gather", role: "researcher", description: "Gather sources and findings", dependsOn: [], priority: PRIORITY.high },
    { key: "synthesize", role: "writer", description: "Synthesize the findings into a report", dependsOn: ["gather"], priority: PRIORITY.medium },
  ],
};

/** Used for task types no template covers. */
export const FALLBACK_STEP: TemplateStep = {
  key: "execute",
  role: "coder",
  description: "Execute the task",
  dependsOn: [],
  priority: PRIORITY.medium,
};

/** Checked in order: the first template whose keyword matches classifies the goal. */
export const DEFAULT_TEMPLATES: DecompositionTemplate[] = [TEST, DOCS, RESEARCH, REFACTOR, DEVELOPMENT];

export const COMPLEXITY_KEYWORDS: { weight: number; words: string[] }[] = [
  { weight: 2, words: ["system", "architecture", "refactor", "develop", "implement", "integrate", "deploy", "test suite", "platform"] },
  { weight: 1, words: ["modify", "fix", "optimize", "add", "update"] },
];

export const COMPLEXITY_THRESHOLDS: Record<Exclude<Complexity, "simple">, number> = {
  complex: 4,
  medium: 2,
};
