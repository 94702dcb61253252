/* ---------- Extension presets, exclusions & prompt library ---------- */

export const EXTENSION_PRESETS: Record<string, string> = {
  None: ".py, .js, .ts, .html, .css, .json",
  "Academic Code": ".py, .ipynb, .r, .csv, .txt",
  "Android (Kotlin/Java)": ".kt, .java, .xml",
  "Backend (General)": ".py, .js, .ts, .java, .c, .cpp, .cs, .go, .php",
  Bioinformatics: ".py, .ipynb, .r, .csv, .tsv, .txt",
  "Data Science": ".py, .ipynb, .r, .csv, .tsv, .txt",
  Django: ".py, .html, .css, .js",
  "Frontend (JS/TS)": ".html, .css, .js, .ts, .json",
  "Machine Learning": ".py, .ipynb, .csv, .txt",
  React: ".js, .jsx, .ts, .tsx, .json, .html, .css",
  VueJS: ".html, .css, .vue, .js, .ts, .json",
  Angular: ".html, .css, .ts, .json",
  "iOS (Swift)": ".swift, .h, .m, .mm, .plist",
  "Performance Optimization": ".py, .js, .ts, .html, .css, .json"
};

export const DEFAULT_EXTENSION_PRESET = "None";

export const BASE_EXCLUSIONS: readonly string[] = [
  ".git",
  ".gitignore",
  ".pycache",
  "pycache",
  "__pycache__",
  "node_modules",
  ".ipynb_checkpoints"
];

export const PRESET_EXCLUSION_MAP: Record<string, readonly string[]> = {
  Django: ["venv", "migrations"],
  "Machine Learning": ["venv", ".ipynb_checkpoints"],
  "Frontend (JS/TS)": ["node_modules"],
  "Backend (General)": ["venv", "node_modules"],
  VueJS: ["node_modules"],
  Angular: ["node_modules"],
  React: ["node_modules"],
  "iOS (Swift)": ["Pods"],
  "Android (Kotlin/Java)": ["build", ".gradle"],
  "Data Science": ["venv", ".ipynb_checkpoints"]
};

export const NO_TEMPLATE = "None (No Template)";

export const PROMPT_LIBRARY: Record<string, string> = {
  [NO_TEMPLATE]: "",
  "Academic Code": "Check academic code correctness. If needed, propose short fixes.",
  Bioinformatics:
    "Make succinct improvements for bioinformatics data processing or analysis.",
  "Bug Fix / Debug":
    "You are a specialized debugging model. Identify and fix any bugs succinctly.",
  "Database Schema Advice":
    "Suggest best-practice improvements for database-related code.",
  "ML Model Tuning":
    "Optimize the ML code or pipeline with short recommended changes.",
  "Performance Optimization":
    "Optimize the code or architecture concisely for better performance.",
  Refactoring: "Refactor the code for clarity and maintainability.",
  "Security Audit":
    "Review code for security issues. Provide short, direct mitigations.",
  "Testing Strategy":
    "Propose a concise testing strategy for the given code or system."
};

export const DEFAULT_OUTPUT_FORMAT = [
  "file: path/to/file.ext",
  "--- START CODE ---",
  "<entire new content for that file>",
  "--- END CODE ---",
  "",
  "Repeat the above block for each file changed.",
  "",
  "Example:",
  "file: src/main.py",
  "--- START CODE ---",
  "def my_function():",
  '    print("Hello World!")',
  "--- END CODE ---",
  "",
  "file: requirements.txt",
  "--- START CODE ---",
  "requests==2.25.1",
  "numpy==1.20.0",
  "--- END CODE ---"
].join("\n");

export const REFLECTION_INSTRUCTIONS = [
  "Before answering, restate the problem in your own words and list the files you intend to change.",
  "After drafting the changes, review them against the problem statement and the constraints,",
  "look for edge cases you missed, and correct the draft before giving the final answer."
].join("\n");

export function sortedPresetNames(): string[] {
  return Object.keys(EXTENSION_PRESETS).sort((a, b) => a.localeCompare(b));
}

export function sortedTemplateNames(): string[] {
  return Object.keys(PROMPT_LIBRARY).sort((a, b) => a.localeCompare(b));
}

export function isExtensionPreset(name: string): boolean {
  return Object.prototype.hasOwnProperty.call(EXTENSION_PRESETS, name);
}

/**
 * Extension list and exclusion list a preset fills the configuration fields
 * with. Unknown names fall back to the default preset.
 */
export function resolveExtensionPreset(name: string): {
  extensions: string;
  exclusions: string;
} {
  const label = isExtensionPreset(name) ? name : DEFAULT_EXTENSION_PRESET;
  const exclusions = new Set<string>(BASE_EXCLUSIONS);
  for (const extra of PRESET_EXCLUSION_MAP[label] ?? []) exclusions.add(extra);
  return {
    extensions: EXTENSION_PRESETS[label] ?? "",
    exclusions: [...exclusions].sort().join(", ")
  };
}

export function templateText(name: string): string {
  return PROMPT_LIBRARY[name] ?? "";
}
