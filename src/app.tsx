import React, { useEffect, useMemo, useReducer, useRef, useState } from "react";
import { Box, Text, useApp, useInput, useStdout } from "ink";
import TextInput from "ink-text-input";
import Spinner from "ink-spinner";
import Gradient from "ink-gradient";
import SyntaxHighlight from "ink-syntax-highlight";
import fsp from "node:fs/promises";
import path from "node:path";
import { copyToClipboard, readClipboard } from "./clipboard.js";
import type { AppConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { getLogger } from "./logger.js";
import { listBackups, restoreBackup } from "./core/backups.js";
import {
  DEFAULT_OUTPUT_FORMAT,
  NO_TEMPLATE,
  resolveExtensionPreset,
  sortedPresetNames,
  sortedTemplateNames,
  templateText
} from "./core/catalog.js";
import { previewEdit, type EditPreview } from "./core/diffPreview.js";
import { readFileText, readSelectedFiles, scanProject, type FileNode } from "./core/fileCollector.js";
import { parseExclusions, parseExtensions, type PathFilter } from "./core/pathFilter.js";
import { loadPresets, removePreset, savePresets, upsertPreset, type Preset } from "./core/presetStore.js";
import {
  buildPrompt,
  chunkPrompt,
  languageForFile,
  promptStats,
  type PromptSections,
  type PromptStats
} from "./core/promptAssembler.js";
import {
  countSelected,
  isFolderChecked,
  isSelected,
  descendantsOf,
  selectOnly,
  selectedPaths,
  setFolder,
  toggleFile,
  toggleFolder
} from "./core/selection.js";
import {
  applyParsedEdits,
  clearResponse,
  createSession,
  forgetProject,
  loadCandidates,
  resolveProjectRoot,
  setResponse,
  toggleApplyChoice
} from "./core/session.js";
import { countTokens, formatBytes } from "./core/tokens.js";
import { ExitConfirm } from "./components/ExitConfirm.js";
import { HelpModal } from "./components/HelpModal.js";
import { ProgressBar } from "./components/ProgressBar.js";
import { ScrollableBox } from "./components/ScrollableBox.js";

/* ---------- Types & constants ---------- */

type Pane = "explorer" | "config" | "preview";
type ConfigTab = "inputs" | "templates" | "options";
type Mode = "main" | "combined" | "apply";
type ApplyList = "edits" | "backups";

type FocusField =
  | "none"
  | "filter"
  | "rootDir"
  | "problem"
  | "constraints"
  | "outputFormat"
  | "additionalInfo"
  | "extensions"
  | "exclusions"
  | "presetName"
  | "exportPath"
  | "responsePath";

interface CombinedResult {
  text: string;
  parts: string[];
  stats: PromptStats;
}

const CONFIG_TAB_LABELS: Record<ConfigTab, string> = {
  inputs: "Inputs",
  templates: "Templates",
  options: "Options"
};

const CHUNK_SIZES = [0, 8000, 16000, 32000, 64000];
const MAX_PREVIEW_CHARS = 2000;
const MAX_SOLUTIONS = 5;

function nextInCycle<T>(list: readonly T[], current: T): T {
  const idx = list.indexOf(current);
  return list[(idx + 1) % list.length] ?? current;
}

/* ---------- Main App ---------- */

export interface AppProps {
  config: AppConfig;
}

export const App: React.FC<AppProps> = ({ config }) => {
  const { exit } = useApp();
  const { stdout } = useStdout();
  const log = useMemo(() => getLogger("ui"), []);

  const session = useRef(createSession());
  const [, refresh] = useReducer((n: number) => n + 1, 0);

  const [rootDir, setRootDir] = useState(config.rootDir);
  const [rootNode, setRootNode] = useState<FileNode | null>(null);
  const [files, setFiles] = useState<FileNode[]>([]);
  const [expanded, setExpanded] = useState<Set<string>>(new Set());

  const [loading, setLoading] = useState(true);
  const [scanError, setScanError] = useState<string | null>(null);
  const [status, setStatus] = useState("Scanning project...");
  const [progressText, setProgressText] = useState<string | null>(null);

  const [activePane, setActivePane] = useState<Pane>("explorer");
  const [configTab, setConfigTab] = useState<ConfigTab>("inputs");
  const [cursor, setCursor] = useState(0);
  const [scrollOffset, setScrollOffset] = useState(0);
  const [filter, setFilter] = useState("");
  const [focusField, setFocusField] = useState<FocusField>("none");

  const [extensionPreset, setExtensionPreset] = useState(config.extensionPreset);
  const [extensionsText, setExtensionsText] = useState(config.extensions);
  const [exclusionsText, setExclusionsText] = useState(config.exclusions);
  const [respectGitignore, setRespectGitignore] = useState(config.respectGitignore);

  const [problem, setProblem] = useState("");
  const [constraints, setConstraints] = useState("");
  const [outputFormat, setOutputFormat] = useState(DEFAULT_OUTPUT_FORMAT);
  const [additionalInfo, setAdditionalInfo] = useState("");
  const [templateName, setTemplateName] = useState(NO_TEMPLATE);
  const [reflection, setReflection] = useState(false);
  const [solutions, setSolutions] = useState(1);
  const [chunkSize, setChunkSize] = useState(0);
  const [minify, setMinify] = useState(false);
  const [removeComments, setRemoveComments] = useState(false);

  const [presets, setPresets] = useState<Preset[]>([]);
  const [presetName, setPresetName] = useState("");
  const [selectedPresetIndex, setSelectedPresetIndex] = useState(0);

  const [previewContent, setPreviewContent] = useState("");
  const [previewLang, setPreviewLang] = useState<string | undefined>(undefined);
  const [promptPreview, setPromptPreview] = useState("");

  const [mode, setMode] = useState<Mode>("main");
  const [combined, setCombined] = useState<CombinedResult | null>(null);
  const [partIndex, setPartIndex] = useState(0);
  const [combinedScrollOffset, setCombinedScrollOffset] = useState(0);
  const [exportPath, setExportPath] = useState("reasoning_prompt.txt");

  const [applyList, setApplyList] = useState<ApplyList>("edits");
  const [editCursor, setEditCursor] = useState(0);
  const [backupCursor, setBackupCursor] = useState(0);
  const [editPreview, setEditPreview] = useState<EditPreview | null>(null);
  const [diffScrollOffset, setDiffScrollOffset] = useState(0);
  const [responsePath, setResponsePath] = useState("response.txt");

  const [showHelp, setShowHelp] = useState(false);
  const [confirmExit, setConfirmExit] = useState(false);

  const rows = stdout.rows ?? 30;
  const cols = stdout.columns ?? 120;
  const listHeight = Math.max(8, rows - 16);

  const selection = session.current.selection;
  const sections: PromptSections = {
    problem,
    constraints,
    outputFormat,
    additionalInfo,
    template: templateText(templateName),
    reflection,
    solutions
  };

  const currentFilter = (overrides: Partial<PathFilter> = {}): PathFilter => ({
    extensions: parseExtensions(extensionsText),
    exclusions: parseExclusions(exclusionsText),
    respectGitignore,
    ...overrides
  });

  /* ---------- Scanning ---------- */

  const handleScan = async (dir: string, pathFilter: PathFilter): Promise<FileNode[]> => {
    setLoading(true);
    setScanError(null);
    setStatus("Scanning project...");
    setProgressText(null);
    setCursor(0);
    setScrollOffset(0);

    try {
      const resolved = await resolveProjectRoot(dir);
      setRootDir(resolved);
      const result = await scanProject(resolved, pathFilter, info => {
        setProgressText(
          info.currentPath
            ? `Scanning ${info.currentPath} (${info.processedFiles} files)...`
            : `Scanning... (${info.processedFiles} files)`
        );
      });
      loadCandidates(
        session.current,
        resolved,
        result.files.map(f => f.relPath)
      );
      const dirs = new Set<string>();
      const collectDirs = (n: FileNode) => {
        if (!n.isDirectory) return;
        dirs.add(n.relPath);
        for (const c of n.children ?? []) collectDirs(c);
      };
      collectDirs(result.root);
      setRootNode(result.root);
      setFiles(result.files);
      setExpanded(dirs);
      setStatus(`Scanned ${result.files.length} files from ${resolved}`);
      return result.files;
    } catch (err) {
      log.error({ dir, err: errorMessage(err) }, "scan failed");
      setScanError(errorMessage(err));
      setStatus("Scan error");
      setRootNode(null);
      setFiles([]);
      forgetProject(session.current);
      return [];
    } finally {
      setLoading(false);
      setProgressText(null);
      refresh();
    }
  };

  useEffect(() => {
    setPresets(loadPresets(config.presetFile));
    void handleScan(rootDir, currentFilter()).then(found => {
      if (found.length) setStatus("Ready");
    });
    // eslint-disable-next-line react-hooks/exhaustive-deps
  }, []);

  const visibleNodes = useMemo(() => {
    if (!rootNode) return [];
    if (filter.trim()) {
      const q = filter.trim().toLowerCase();
      return files.filter(f => f.relPath.toLowerCase().includes(q));
    }
    const out: FileNode[] = [];
    const traverse = (n: FileNode) => {
      out.push(n);
      if (n.isDirectory && expanded.has(n.relPath)) {
        for (const child of n.children ?? []) traverse(child);
      }
    };
    traverse(rootNode);
    return out;
  }, [rootNode, files, expanded, filter]);

  useEffect(() => {
    if (cursor >= visibleNodes.length) {
      setCursor(visibleNodes.length > 0 ? visibleNodes.length - 1 : 0);
      setScrollOffset(0);
    }
  }, [visibleNodes.length, cursor]);

  useEffect(() => {
    if (cursor < scrollOffset) {
      setScrollOffset(cursor);
    } else if (cursor >= scrollOffset + listHeight) {
      setScrollOffset(cursor - listHeight + 1);
    }
  }, [cursor, scrollOffset, listHeight]);

  /* ---------- Stats & previews ---------- */

  const stats = useMemo(() => {
    const chosen = files.filter(f => isSelected(selection, f.relPath));
    const sizeBytes = chosen.reduce((acc, f) => acc + f.sizeBytes, 0);
    const textTokens =
      countTokens(problem) + countTokens(constraints) + countTokens(outputFormat) + countTokens(additionalInfo);
    return {
      fileCount: chosen.length,
      sizeBytes,
      tokens: Math.ceil(sizeBytes / 4) + textTokens
    };
  }, [files, selection, problem, constraints, outputFormat, additionalInfo]);

  useEffect(() => {
    const node = visibleNodes[cursor];
    if (!node || node.isDirectory) {
      setPreviewContent("");
      setPreviewLang(undefined);
      return;
    }
    let cancelled = false;
    setPreviewLang(languageForFile(node.name) || undefined);
    readFileText(node.path, { maxBytes: MAX_PREVIEW_CHARS * 4 })
      .then(content => {
        if (!cancelled) setPreviewContent(content.slice(0, MAX_PREVIEW_CHARS));
      })
      .catch(err => {
        if (!cancelled) setPreviewContent("// Error reading file: " + errorMessage(err));
      });
    return () => {
      cancelled = true;
    };
  }, [visibleNodes, cursor]);

  useEffect(() => {
    const root = session.current.rootDir;
    if (!rootNode || !root) {
      setPromptPreview("");
      return;
    }
    let cancelled = false;
    const timer = setTimeout(() => {
      const chosen = selectedPaths(selection);
      readSelectedFiles(root, chosen.slice(0, 3), { maxBytes: 1200 })
        .then(sources => {
          const sample = buildPrompt(
            sources.map(s => ({ ...s, content: s.content.split(/\r?\n/).slice(0, 40).join("\n") })),
            sections
          );
          const more = chosen.length > 3 ? `\n... + ${chosen.length - 3} more file(s) in full prompt.` : "";
          const text = sample + more;
          if (!cancelled) setPromptPreview(text.length > 4000 ? text.slice(0, 4000) + "\n..." : text);
        })
        .catch(err => {
          if (!cancelled) setPromptPreview("// Error building preview: " + errorMessage(err));
        });
    }, 400);
    return () => {
      cancelled = true;
      clearTimeout(timer);
    };
    // eslint-disable-next-line react-hooks/exhaustive-deps
  }, [rootNode, selection, problem, constraints, outputFormat, additionalInfo, templateName, reflection, solutions]);

  const parsedEdits = session.current.parsedEdits;
  const backupOptions = listBackups(session.current);

  useEffect(() => {
    const root = session.current.rootDir;
    const edit = parsedEdits[editCursor];
    if (mode !== "apply" || !root || !edit) {
      setEditPreview(null);
      return;
    }
    let cancelled = false;
    previewEdit(root, edit)
      .then(p => {
        if (!cancelled) setEditPreview(p);
      })
      .catch(err => {
        if (!cancelled) setStatus("Could not build diff: " + errorMessage(err));
      });
    setDiffScrollOffset(0);
    return () => {
      cancelled = true;
    };
  }, [mode, parsedEdits, editCursor, backupOptions.length]);

  /* ---------- Selection ---------- */

  const toggleSelectNode = (node: FileNode) => {
    if (node.isDirectory) {
      const count = descendantsOf(selection, node.relPath).length;
      const wasChecked = isFolderChecked(selection, node.relPath);
      session.current.selection = toggleFolder(selection, node.relPath);
      setStatus(`${wasChecked ? "Deselected" : "Selected"} ${count} files in "${node.relPath}"`);
    } else {
      session.current.selection = toggleFile(selection, node.relPath);
    }
    refresh();
  };

  const selectAll = (value: boolean) => {
    session.current.selection = setFolder(selection, ".", value);
    setStatus(value ? "Selected all files." : "Cleared selection.");
    refresh();
  };

  const moveCursor = (delta: number) => {
    if (!visibleNodes.length) return;
    const maxIndex = visibleNodes.length - 1;
    setCursor(Math.min(maxIndex, Math.max(0, cursor + delta)));
  };

  /* ---------- Filters & presets ---------- */

  const applyExtensionPreset = (name: string) => {
    const preset = resolveExtensionPreset(name);
    setExtensionPreset(name);
    setExtensionsText(preset.extensions);
    setExclusionsText(preset.exclusions);
    void handleScan(rootDir, {
      extensions: parseExtensions(preset.extensions),
      exclusions: parseExclusions(preset.exclusions),
      respectGitignore
    });
  };

  const handleSavePreset = () => {
    const name = presetName.trim();
    if (!name) {
      setStatus("Preset name cannot be empty.");
      return;
    }
    const preset: Preset = {
      name,
      rootDir,
      extensions: extensionsText,
      exclusions: exclusionsText,
      templateName,
      problem,
      constraints,
      outputFormat,
      additionalInfo,
      reflection,
      solutions,
      selectedRelPaths: selectedPaths(selection),
      createdAt: new Date().toISOString()
    };
    const next = upsertPreset(presets, preset);
    try {
      savePresets(config.presetFile, next);
      setPresets(next);
      setPresetName("");
      setStatus(`Saved preset "${name}".`);
    } catch (err) {
      setStatus(`Could not save preset: ${errorMessage(err)}`);
    }
  };

  const handleLoadPreset = (index: number) => {
    const preset = presets[index];
    if (!preset) return;
    setExtensionsText(preset.extensions);
    setExclusionsText(preset.exclusions);
    setTemplateName(preset.templateName || NO_TEMPLATE);
    setProblem(preset.problem);
    setConstraints(preset.constraints);
    setOutputFormat(preset.outputFormat || DEFAULT_OUTPUT_FORMAT);
    setAdditionalInfo(preset.additionalInfo);
    setReflection(preset.reflection);
    setSolutions(preset.solutions);
    setStatus(`Loading preset "${preset.name}"...`);

    void handleScan(preset.rootDir || rootDir, {
      extensions: parseExtensions(preset.extensions),
      exclusions: parseExclusions(preset.exclusions),
      respectGitignore
    }).then(found => {
      if (!found.length) return;
      session.current.selection = selectOnly(session.current.selection, preset.selectedRelPaths);
      setStatus(
        `Loaded preset "${preset.name}" (${countSelected(session.current.selection)} files selected).`
      );
      refresh();
    });
  };

  const handleDeletePreset = (index: number) => {
    const preset = presets[index];
    if (!preset) return;
    const next = removePreset(presets, index);
    try {
      savePresets(config.presetFile, next);
    } catch (err) {
      setStatus(`Could not save presets: ${errorMessage(err)}`);
      return;
    }
    setPresets(next);
    setSelectedPresetIndex(prev => (prev >= next.length ? Math.max(0, next.length - 1) : prev));
    setStatus(`Deleted preset "${preset.name}".`);
  };

  /* ---------- Prompt generation ---------- */

  const handleGenerate = async () => {
    const root = session.current.rootDir;
    if (!root || !rootNode) {
      setStatus("Invalid or missing folder path.");
      return;
    }
    const chosen = selectedPaths(selection);
    if (!chosen.length) {
      setStatus("No files selected. Select at least one file first.");
      return;
    }

    setStatus("Generating prompt...");
    try {
      const sources = await readSelectedFiles(root, chosen, {
        maxBytes: config.maxReadBytes,
        transform: { minify, removeComments }
      });
      const text = buildPrompt(sources, sections);
      const parts = chunkPrompt(text, chunkSize);
      const result: CombinedResult = { text, parts, stats: promptStats(text) };
      setCombined(result);
      setPartIndex(0);
      setCombinedScrollOffset(0);
      const copied = await copyToClipboard(parts[0] ?? text);
      setMode("combined");
      log.info({ files: sources.length, bytes: result.stats.bytes, parts: parts.length }, "prompt generated");
      setStatus(
        `${copied ? "Copied to clipboard" : "Generated"}: ${formatBytes(result.stats.bytes)}, ~${result.stats.tokens.toLocaleString()} tokens` +
          (parts.length > 1 ? `, part 1 of ${parts.length}.` : ".")
      );
    } catch (err) {
      setStatus(errorMessage(err));
    }
  };

  const handleSaveCombinedToFile = async () => {
    if (!combined) return;
    const target = exportPath.trim() || "reasoning_prompt.txt";
    const resolved = path.isAbsolute(target) ? target : path.resolve(rootDir, target);
    try {
      await fsp.writeFile(resolved, combined.text, "utf8");
      setStatus(`Saved prompt to ${resolved}`);
    } catch (err) {
      setStatus(errorMessage(err));
    }
  };

  /* ---------- Applying responses ---------- */

  const loadResponse = (text: string) => {
    setResponse(session.current, text);
    setEditCursor(0);
    setApplyList("edits");
    const { parseError } = session.current;
    setStatus(parseError ?? `Parsed ${session.current.parsedEdits.length} edit(s). Review, then press [A] to apply.`);
    refresh();
  };

  const handlePasteResponse = async () => {
    const text = await readClipboard();
    if (text === null) {
      setStatus("Clipboard read failed.");
      return;
    }
    loadResponse(text);
  };

  const handleLoadResponseFile = async () => {
    const target = responsePath.trim();
    if (!target) {
      setStatus("No response provided.");
      return;
    }
    const resolved = path.isAbsolute(target) ? target : path.resolve(rootDir, target);
    try {
      loadResponse(await fsp.readFile(resolved, "utf8"));
    } catch (err) {
      setStatus(`Could not read response: ${errorMessage(err)}`);
    }
  };

  const handleApply = async () => {
    try {
      setStatus(await applyParsedEdits(session.current));
    } catch (err) {
      setStatus(errorMessage(err));
    }
    refresh();
  };

  const handleRestore = async () => {
    const option = backupOptions[backupCursor];
    const outcome = await restoreBackup(session.current, option?.value);
    setStatus(outcome.message);
    refresh();
  };

  /* ---------- Input ---------- */

  useInput((input, key) => {
    if (key.ctrl && input === "c") {
      exit();
      return;
    }

    // F1 toggles help modal
    if (input === "\x1bOP" || input === "\x1b[11~" || (key.meta && input === "1")) {
      setShowHelp(prev => !prev);
      setConfirmExit(false);
      return;
    }

    if (showHelp) {
      if (key.escape) setShowHelp(false);
      return;
    }

    if (key.escape && mode === "main" && focusField === "none") {
      if (confirmExit) {
        exit();
      } else {
        setConfirmExit(true);
      }
      return;
    }

    if (confirmExit && !key.escape) {
      setConfirmExit(false);
      setStatus("Exit cancelled.");
    }

    if (focusField !== "none") {
      if (key.escape) {
        setFocusField("none");
        return;
      }
      if (key.return) {
        setFocusField("none");
        if (focusField === "rootDir") void handleScan(rootDir, currentFilter());
        if (focusField === "extensions" || focusField === "exclusions") {
          void handleScan(rootDir, currentFilter());
        }
        if (focusField === "presetName") handleSavePreset();
        if (focusField === "exportPath") void handleSaveCombinedToFile();
        if (focusField === "responsePath") void handleLoadResponseFile();
      }
      return;
    }

    const lower = input.toLowerCase();

    if (mode === "combined") {
      if (key.escape || lower === "q") {
        setMode("main");
        setCombinedScrollOffset(0);
        setStatus("Back to main view.");
        return;
      }
      if (!combined) return;
      const shown = combined.parts[partIndex] ?? combined.text;
      const shownLines = shown.split("\n").length;
      const viewHeight = Math.max(5, rows - 15);
      const maxScroll = Math.max(0, shownLines - viewHeight);
      if (lower === "y") {
        void copyToClipboard(shown).then(ok =>
          setStatus(
            ok
              ? combined.parts.length > 1
                ? `Copied part ${partIndex + 1} of ${combined.parts.length} to clipboard.`
                : "Copied prompt to clipboard."
              : "Clipboard copy failed."
          )
        );
        return;
      }
      if (lower === "w") {
        setFocusField("exportPath");
        return;
      }
      if (input === "]" || input === "[") {
        const delta = input === "]" ? 1 : -1;
        const next = Math.min(combined.parts.length - 1, Math.max(0, partIndex + delta));
        setPartIndex(next);
        setCombinedScrollOffset(0);
        setStatus(`Showing part ${next + 1} of ${combined.parts.length}.`);
        return;
      }
      if (key.upArrow || input === "k") {
        setCombinedScrollOffset(prev => Math.max(0, prev - 1));
        return;
      }
      if (key.downArrow || input === "j") {
        setCombinedScrollOffset(prev => Math.min(maxScroll, prev + 1));
        return;
      }
      if (key.pageUp || input === "b") {
        setCombinedScrollOffset(prev => Math.max(0, prev - viewHeight));
        return;
      }
      if (key.pageDown || input === " ") {
        setCombinedScrollOffset(prev => Math.min(maxScroll, prev + viewHeight));
      }
      return;
    }

    if (mode === "apply") {
      if (key.escape || lower === "q") {
        setMode("main");
        setStatus("Back to main view.");
        return;
      }
      if (lower === "v") {
        void handlePasteResponse();
        return;
      }
      if (lower === "f") {
        setFocusField("responsePath");
        return;
      }
      if (lower === "a") {
        void handleApply();
        return;
      }
      if (lower === "c") {
        clearResponse(session.current);
        setEditCursor(0);
        setStatus("Cleared parsed response.");
        refresh();
        return;
      }
      if (lower === "b" || key.tab) {
        setApplyList(prev => (prev === "edits" ? "backups" : "edits"));
        return;
      }
      if (input === "]") {
        setDiffScrollOffset(prev => prev + Math.max(5, rows - 20));
        return;
      }
      if (input === "[") {
        setDiffScrollOffset(prev => Math.max(0, prev - Math.max(5, rows - 20)));
        return;
      }
      if (applyList === "edits") {
        if (key.upArrow || input === "k") {
          setEditCursor(prev => Math.max(0, prev - 1));
          return;
        }
        if (key.downArrow || input === "j") {
          setEditCursor(prev => Math.min(Math.max(0, parsedEdits.length - 1), prev + 1));
          return;
        }
        if (input === " ") {
          const edit = parsedEdits[editCursor];
          if (edit) {
            toggleApplyChoice(session.current, edit.filename);
            refresh();
          }
        }
        return;
      }
      if (key.upArrow || input === "k") {
        setBackupCursor(prev => Math.max(0, prev - 1));
        return;
      }
      if (key.downArrow || input === "j") {
        setBackupCursor(prev => Math.min(Math.max(0, backupOptions.length - 1), prev + 1));
        return;
      }
      if (lower === "r") {
        void handleRestore();
      }
      return;
    }

    if (key.ctrl && lower === "g") {
      void handleGenerate();
      return;
    }

    if (key.ctrl && lower === "u") {
      setMode("apply");
      setStatus(
        session.current.parsedEdits.length
          ? `${session.current.parsedEdits.length} parsed edit(s) pending.`
          : "Press [V] to paste a model response from the clipboard or [F] to load it from a file."
      );
      return;
    }

    if (key.tab) {
      const panes: Pane[] = ["explorer", "config", "preview"];
      setActivePane(nextInCycle(panes, activePane));
      return;
    }

    if (activePane === "explorer") {
      if (key.upArrow || input === "k") {
        moveCursor(-1);
        return;
      }
      if (key.downArrow || input === "j") {
        moveCursor(1);
        return;
      }

      const node = visibleNodes[cursor];

      if (key.leftArrow || input === "h") {
        if (node && node.isDirectory && expanded.has(node.relPath)) {
          const next = new Set(expanded);
          next.delete(node.relPath);
          setExpanded(next);
        }
        return;
      }

      if (key.rightArrow || input === "l") {
        if (node && node.isDirectory && !expanded.has(node.relPath)) {
          const next = new Set(expanded);
          next.add(node.relPath);
          setExpanded(next);
        }
        return;
      }

      if (input === " ") {
        if (node) toggleSelectNode(node);
        return;
      }

      if (key.return) {
        if (node) {
          if (node.isDirectory) {
            const next = new Set(expanded);
            if (next.has(node.relPath)) next.delete(node.relPath);
            else next.add(node.relPath);
            setExpanded(next);
          } else {
            toggleSelectNode(node);
          }
        }
        return;
      }

      if (input === "/" || lower === "f") {
        setFocusField("filter");
        return;
      }
      if (lower === "d") {
        setFocusField("rootDir");
        return;
      }
      if (lower === "a") {
        selectAll(true);
        return;
      }
      if (lower === "n") {
        selectAll(false);
      }
      return;
    }

    if (activePane === "config") {
      if (key.leftArrow || key.rightArrow) {
        const tabs: ConfigTab[] = ["inputs", "templates", "options"];
        setConfigTab(key.rightArrow ? nextInCycle(tabs, configTab) : nextInCycle([...tabs].reverse(), configTab));
        return;
      }

      if (configTab === "inputs") {
        if (lower === "p") setFocusField("problem");
        if (lower === "c") setFocusField("constraints");
        if (lower === "o") setFocusField("outputFormat");
        if (lower === "i") setFocusField("additionalInfo");
        return;
      }

      if (configTab === "templates") {
        if (lower === "e") {
          applyExtensionPreset(nextInCycle(sortedPresetNames(), extensionPreset));
          return;
        }
        if (lower === "t") {
          setTemplateName(nextInCycle(sortedTemplateNames(), templateName));
          return;
        }
        if (key.upArrow || input === "k") {
          setSelectedPresetIndex(prev => (prev <= 0 ? 0 : prev - 1));
          return;
        }
        if (key.downArrow || input === "j") {
          setSelectedPresetIndex(prev => (prev >= presets.length - 1 ? Math.max(0, presets.length - 1) : prev + 1));
          return;
        }
        if (lower === "l") {
          if (presets.length) handleLoadPreset(selectedPresetIndex);
          return;
        }
        if (lower === "x") {
          if (presets.length) handleDeletePreset(selectedPresetIndex);
          return;
        }
        if (lower === "s") {
          setFocusField("presetName");
        }
        return;
      }

      if (lower === "e") {
        setFocusField("extensions");
        return;
      }
      if (lower === "x") {
        setFocusField("exclusions");
        return;
      }
      if (lower === "g") {
        const next = !respectGitignore;
        setRespectGitignore(next);
        void handleScan(rootDir, currentFilter({ respectGitignore: next }));
        return;
      }
      if (lower === "r") {
        setReflection(prev => !prev);
        return;
      }
      if (input === "+" || input === "=") {
        setSolutions(prev => Math.min(MAX_SOLUTIONS, prev + 1));
        return;
      }
      if (input === "-") {
        setSolutions(prev => Math.max(1, prev - 1));
        return;
      }
      if (lower === "k") {
        setChunkSize(prev => nextInCycle(CHUNK_SIZES, prev));
        return;
      }
      if (lower === "m") {
        setMinify(prev => !prev);
        return;
      }
      if (lower === "n") {
        setRemoveComments(prev => !prev);
      }
    }
  });

  /* ---------- Rendering ---------- */

  const cost = (stats.tokens / 1_000_000) * config.costPer1MTokens;
  const contextPercent = Math.min(1, stats.tokens / config.contextWindow);
  const contextWarning =
    stats.tokens > config.contextWindow
      ? "Warning: Estimated tokens exceed context window; enable chunking or trim the selection."
      : stats.tokens > config.contextWindow * 0.8
      ? "Large prompt; consider chunking it into parts."
      : "";

  const onOff = (on: boolean) => <Text color={on ? "green" : "red"}>{on ? "ON" : "OFF"}</Text>;

  if (loading && !rootNode) {
    return (
      <Box padding={2} flexDirection="column">
        <Box>
          <Spinner type="dots" />
          <Text> Scanning project...</Text>
        </Box>
        {progressText && (
          <Box marginTop={1}>
            <Text>{progressText}</Text>
          </Box>
        )}
      </Box>
    );
  }

  if (mode === "combined") {
    const shown = combined ? combined.parts[partIndex] ?? combined.text : "";
    const combinedLines = shown.split("\n");
    const combinedViewHeight = Math.max(5, rows - 15);

    return (
      <Box flexDirection="column" height={rows} width={cols} paddingX={1}>
        <Box justifyContent="center" height={3} alignItems="center">
          <Gradient name="pastel">
            <Text bold>══════ Generated Prompt ══════</Text>
          </Gradient>
        </Box>
        <Box flexDirection="row" borderStyle="round" borderColor="cyan" paddingX={1} paddingY={1} flexGrow={1}>
          <ScrollableBox
            height={combinedViewHeight}
            scrollOffset={combinedScrollOffset}
            showScrollbar={combinedLines.length > combinedViewHeight}
            accentColor="cyan"
          >
            {combinedLines.map((line, idx) => (
              <Text key={idx}>{line || " "}</Text>
            ))}
          </ScrollableBox>
        </Box>
        <Box borderTop borderStyle="single" borderColor="gray" paddingTop={1} flexDirection="column">
          <Box justifyContent="space-between">
            <Text dimColor>[J/K] Scroll  [Space/B] Page  [ [ ] ] Part  [Y] Copy  [W] Save  [Esc/Q] Back</Text>
            {combined && (
              <Text>
                {formatBytes(combined.stats.bytes)} | Lines: {combined.stats.lines} | Tokens:{" "}
                {combined.stats.tokens.toLocaleString()}
                {combined.parts.length > 1 ? ` | Part ${partIndex + 1}/${combined.parts.length}` : ""}
              </Text>
            )}
          </Box>
          {combined && (
            <Box marginTop={1} flexDirection="column">
              <ProgressBar
                percent={Math.min(1, combined.stats.tokens / config.contextWindow)}
                color={combined.stats.tokens > config.contextWindow ? "red" : "green"}
              />
              <Text dimColor>
                {Math.round((combined.stats.tokens / config.contextWindow) * 1000) / 10}% of{" "}
                {config.contextWindow.toLocaleString()}-token context
              </Text>
            </Box>
          )}
          <Box marginTop={1}>
            <Text color="green">{status}</Text>
          </Box>
          {focusField === "exportPath" && (
            <Box marginTop={1}>
              <Text>Save as: </Text>
              <TextInput value={exportPath} onChange={setExportPath} focus={true} />
            </Box>
          )}
        </Box>
      </Box>
    );
  }

  if (mode === "apply") {
    const listWidth = Math.max(24, Math.floor(cols * 0.35));
    const diffHeight = Math.max(5, rows - 14);
    const diffLines = editPreview?.lines ?? [];

    return (
      <Box flexDirection="column" height={rows} width={cols} paddingX={1}>
        <Box justifyContent="center" height={3} alignItems="center">
          <Gradient name="morning">
            <Text bold>══════ Apply Model Response ══════</Text>
          </Gradient>
        </Box>
        <Box flexDirection="row" flexGrow={1}>
          <Box width={listWidth} flexDirection="column">
            <Box
              flexDirection="column"
              borderStyle="single"
              borderColor={applyList === "edits" ? "cyan" : "gray"}
              paddingX={1}
            >
              <Text bold>PARSED EDITS</Text>
              {parsedEdits.length === 0 && <Text dimColor>No parsed edits.</Text>}
              {parsedEdits.map((edit, idx) => {
                const isCursor = applyList === "edits" && idx === editCursor;
                const on = session.current.applyChoices.get(edit.filename) === true;
                return (
                  <Text key={`${idx}:${edit.filename}`} color={isCursor ? "cyan" : on ? "green" : "white"}>
                    {isCursor ? ">" : " "} [{on ? "x" : " "}] {edit.filename}
                  </Text>
                );
              })}
            </Box>
            <Box
              flexDirection="column"
              borderStyle="single"
              borderColor={applyList === "backups" ? "cyan" : "gray"}
              paddingX={1}
            >
              <Text bold>BACKUPS</Text>
              {backupOptions.length === 0 && <Text dimColor>No backups this session.</Text>}
              {backupOptions.map((opt, idx) => {
                const isCursor = applyList === "backups" && idx === backupCursor;
                return (
                  <Text key={`${idx}:${opt.value}`} color={isCursor ? "cyan" : "white"}>
                    {isCursor ? ">" : " "} {opt.label}
                  </Text>
                );
              })}
            </Box>
          </Box>
          <Box flexDirection="column" flexGrow={1} borderStyle="single" borderColor="gray" paddingX={1}>
            <Box justifyContent="space-between">
              <Text bold>DIFF {editPreview ? editPreview.filename : ""}</Text>
              {editPreview && (
                <Text>
                  {editPreview.exists ? "" : "new file  "}
                  <Text color="green">+{editPreview.added}</Text> <Text color="red">-{editPreview.removed}</Text>
                </Text>
              )}
            </Box>
            {session.current.parseError && <Text color="red">{session.current.parseError}</Text>}
            {editPreview?.note && <Text dimColor>{editPreview.note}</Text>}
            <ScrollableBox height={diffHeight} scrollOffset={Math.min(diffScrollOffset, Math.max(0, diffLines.length - diffHeight))}>
              {diffLines.map((line, idx) => (
                <Text
                  key={idx}
                  color={line.type === "added" ? "green" : line.type === "removed" ? "red" : undefined}
                  dimColor={line.type === "context"}
                >
                  {line.type === "added" ? "+ " : line.type === "removed" ? "- " : "  "}
                  {line.content || " "}
                </Text>
              ))}
            </ScrollableBox>
          </Box>
        </Box>
        <Box borderTop borderStyle="single" borderColor="gray" flexDirection="column">
          <Text dimColor>
            [V] Paste  [F] Load file  [J/K] Move  [Space] Toggle  [A] Apply  [C] Clear  [B/Tab] Edits/Backups  [R] Restore  [ [ ] ] Scroll diff  [Esc/Q] Back
          </Text>
          <Text color={status.startsWith("Error") ? "red" : "green"}>{status}</Text>
          {focusField === "responsePath" && (
            <Box>
              <Text>Response file: </Text>
              <TextInput value={responsePath} onChange={setResponsePath} focus={true} />
            </Box>
          )}
        </Box>
      </Box>
    );
  }

  const explorerWidth = Math.max(20, Math.floor(cols * 0.4));
  const configWidth = Math.max(15, Math.floor(cols * 0.3));
  const previewWidth = Math.max(10, cols - explorerWidth - configWidth - 4);

  return (
    <Box flexDirection="column" height={rows} width={cols} paddingX={1}>
      <Box justifyContent="center" height={3} alignItems="center">
        <Gradient name="morning">
          <Text bold>══════ Prompter ══════</Text>
        </Gradient>
      </Box>

      <Box marginBottom={1}>
        <Text>Root: </Text>
        <TextInput value={rootDir} onChange={setRootDir} focus={focusField === "rootDir"} />
      </Box>

      <Box flexDirection="column" flexGrow={1} borderStyle="round" borderColor="gray">
        <Box flexDirection="row" flexGrow={1}>
          {/* Explorer */}
          <Box
            width={explorerWidth}
            flexDirection="column"
            borderStyle="single"
            borderColor={activePane === "explorer" ? "cyan" : "gray"}
          >
            <Box borderBottom borderStyle="single" borderColor="gray" paddingX={1} justifyContent="space-between">
              <Text bold color={activePane === "explorer" ? "cyan" : "white"}>
                EXPLORER
              </Text>
              <Text dimColor>
                {countSelected(selection)} file(s) selected / {files.length}
              </Text>
            </Box>

            <Box borderBottom borderStyle="single" borderColor="gray" paddingX={1}>
              <Text color="cyan">Filter: </Text>
              <TextInput
                value={filter}
                onChange={setFilter}
                focus={focusField === "filter"}
                placeholder="Filter by path..."
              />
            </Box>

            <Box flexDirection="row" flexGrow={1} paddingLeft={1}>
              {visibleNodes.length === 0 ? (
                <Text dimColor>
                  {scanError ? "Enter a valid folder path to see contents." : "No files match current filter."}
                </Text>
              ) : (
                <ScrollableBox
                  height={listHeight}
                  scrollOffset={scrollOffset}
                  showScrollbar={visibleNodes.length > listHeight}
                  accentColor="cyan"
                >
                  {visibleNodes.map((node, idx) => {
                    const isCursor = idx === cursor;
                    const checked = node.isDirectory
                      ? isFolderChecked(selection, node.relPath)
                      : isSelected(selection, node.relPath);
                    const partial =
                      node.isDirectory &&
                      !checked &&
                      descendantsOf(selection, node.relPath).some(p => isSelected(selection, p));
                    const indent = filter.trim() ? 0 : node.depth;
                    const mark = checked ? "[x]" : partial ? "[~]" : "[ ]";
                    const arrow = node.isDirectory ? (expanded.has(node.relPath) ? "v " : "> ") : "";
                    const color = isCursor ? "cyan" : node.isDirectory ? "yellow" : checked ? "green" : "white";

                    return (
                      <Box key={node.path}>
                        <Text color={isCursor ? "cyan" : "gray"}>{isCursor ? ">" : " "}</Text>
                        <Text dimColor>{" ".repeat(indent)}</Text>
                        <Text color={color}>
                          {mark} {arrow}
                          {node.relPath === "." ? node.name : filter.trim() ? node.relPath : node.name}{" "}
                          {!node.isDirectory && `(${formatBytes(node.sizeBytes)})`}
                        </Text>
                      </Box>
                    );
                  })}
                </ScrollableBox>
              )}
            </Box>
          </Box>

          {/* Config */}
          <Box
            width={configWidth}
            flexDirection="column"
            borderStyle="single"
            borderColor={activePane === "config" ? "cyan" : "gray"}
          >
            <Box flexDirection="row" borderBottom borderStyle="single" borderColor="gray">
              {(["inputs", "templates", "options"] as const).map(tab => (
                <Box key={tab} paddingX={1} borderStyle="single" borderColor={configTab === tab ? "cyan" : "gray"}>
                  <Text bold={configTab === tab}>{CONFIG_TAB_LABELS[tab]}</Text>
                </Box>
              ))}
            </Box>

            {configTab === "inputs" && (
              <Box flexDirection="column" padding={1}>
                <Text bold>Problem statement</Text>
                <Box borderStyle="single" borderColor={focusField === "problem" ? "cyan" : "gray"} paddingX={1}>
                  <TextInput
                    value={problem}
                    onChange={setProblem}
                    focus={focusField === "problem"}
                    placeholder="What should the model solve?"
                  />
                </Box>
                <Text bold>Constraints / warnings</Text>
                <Box borderStyle="single" borderColor={focusField === "constraints" ? "cyan" : "gray"} paddingX={1}>
                  <TextInput
                    value={constraints}
                    onChange={setConstraints}
                    focus={focusField === "constraints"}
                    placeholder="Things the model must respect..."
                  />
                </Box>
                <Text bold>Output format</Text>
                <Box borderStyle="single" borderColor={focusField === "outputFormat" ? "cyan" : "gray"} paddingX={1}>
                  <TextInput
                    value={outputFormat}
                    onChange={setOutputFormat}
                    focus={focusField === "outputFormat"}
                    placeholder="Expected response format..."
                  />
                </Box>
                <Text bold>Additional information</Text>
                <Box borderStyle="single" borderColor={focusField === "additionalInfo" ? "cyan" : "gray"} paddingX={1}>
                  <TextInput
                    value={additionalInfo}
                    onChange={setAdditionalInfo}
                    focus={focusField === "additionalInfo"}
                    placeholder="Logs, stack traces, links..."
                  />
                </Box>
                <Box marginTop={1}>
                  <Text dimColor>[P] Problem [C] Constraints [O] Format [I] Info</Text>
                </Box>
              </Box>
            )}

            {configTab === "templates" && (
              <Box flexDirection="column" padding={1}>
                <Text>
                  Extension preset: <Text color="cyan">{extensionPreset}</Text> [E]
                </Text>
                <Text>
                  Prompt template: <Text color="cyan">{templateName}</Text> [T]
                </Text>
                <Box marginTop={1} flexDirection="column">
                  <Text bold>Saved presets</Text>
                  {presets.length === 0 && <Text dimColor>No presets yet. Press 'S' to save one.</Text>}
                  {presets.map((p, idx) => {
                    const active = idx === selectedPresetIndex;
                    return (
                      <Box key={p.name}>
                        <Text color={active ? "cyanBright" : "white"}>
                          {active ? "*" : " "} {p.name}
                        </Text>
                      </Box>
                    );
                  })}
                </Box>
                <Box borderTop borderStyle="single" borderColor="gray" paddingTop={1} flexDirection="column">
                  <Box>
                    <Text>Name: </Text>
                    <TextInput
                      value={presetName}
                      onChange={setPresetName}
                      focus={focusField === "presetName"}
                      placeholder="Preset name..."
                    />
                  </Box>
                  <Text dimColor>[J/K] Move [L] Load [X] Delete [S] Save</Text>
                </Box>
              </Box>
            )}

            {configTab === "options" && (
              <Box flexDirection="column" padding={1}>
                <Text>Extensions [E]:</Text>
                <Box borderStyle="single" borderColor={focusField === "extensions" ? "cyan" : "gray"} paddingX={1}>
                  <TextInput value={extensionsText} onChange={setExtensionsText} focus={focusField === "extensions"} />
                </Box>
                <Text>Exclusions [X]:</Text>
                <Box borderStyle="single" borderColor={focusField === "exclusions" ? "cyan" : "gray"} paddingX={1}>
                  <TextInput value={exclusionsText} onChange={setExclusionsText} focus={focusField === "exclusions"} />
                </Box>
                <Text>Respect .gitignore: {onOff(respectGitignore)} [G]</Text>
                <Text>Reflection: {onOff(reflection)} [R]</Text>
                <Text>
                  Solutions requested: <Text color="cyan">{solutions}</Text> [+/-]
                </Text>
                <Text>
                  Chunk size:{" "}
                  <Text color="cyan">{chunkSize ? `${chunkSize.toLocaleString()} tokens` : "off"}</Text> [K]
                </Text>
                <Text>Minify: {onOff(minify)} [M]</Text>
                <Text>Remove comments: {onOff(removeComments)} [N]</Text>
              </Box>
            )}
          </Box>

          {/* Preview & stats */}
          <Box
            width={previewWidth}
            flexDirection="column"
            borderStyle="single"
            borderColor={activePane === "preview" ? "cyan" : "gray"}
          >
            <Box borderBottom borderStyle="single" borderColor="gray" paddingX={1}>
              <Text bold>FILE PREVIEW</Text>
            </Box>
            <Box flexGrow={1} paddingX={1}>
              <SyntaxHighlight
                language={previewLang}
                code={previewContent || "// Select a file to preview (or press Ctrl+G to generate)."}
              />
            </Box>
            <Box borderTop borderStyle="single" borderColor="gray" flexDirection="column" padding={1}>
              <Box justifyContent="space-between">
                <Text>
                  Tokens: <Text color="magenta">~{stats.tokens.toLocaleString()}</Text>
                </Text>
                <Text color="green">${cost.toFixed(4)}</Text>
              </Box>
              <ProgressBar percent={contextPercent} color={stats.tokens > config.contextWindow ? "red" : "green"} />
              <Text dimColor>
                {Math.round(contextPercent * 1000) / 10}% of {config.contextWindow.toLocaleString()}-token context
              </Text>
              {contextWarning && <Text color="yellow">{contextWarning}</Text>}
              <Box marginTop={1} flexDirection="column">
                <Text>
                  Size: {formatBytes(stats.sizeBytes)} | Files: {stats.fileCount}
                </Text>
                <Text dimColor>Ctrl+G: generate prompt | Ctrl+U: apply a response</Text>
              </Box>
            </Box>
          </Box>
        </Box>

        {/* Prompt sample */}
        <Box borderTop borderStyle="single" borderColor="gray" flexDirection="column" padding={1}>
          <Text bold>PROMPT SAMPLE</Text>
          <Text dimColor>First part of the prompt for the current selection and inputs.</Text>
          <Box marginTop={1}>
            <SyntaxHighlight language="markdown" code={promptPreview || "// Select some files to see a sample."} />
          </Box>
        </Box>
      </Box>

      <Box height={2} justifyContent="space-between" paddingX={1} borderTop borderStyle="single" borderColor="gray">
        <Box flexDirection="column">
          <Text dimColor>F1: Help | Tab: Panes | Explorer: j/k, h/l, Space/Enter, / filter, D root, A/N all/none</Text>
          <Text dimColor>Config: arrows switch tabs | Ctrl+G: Generate | Ctrl+U: Apply response | Esc: Quit (2x)</Text>
        </Box>
        <Box alignItems="flex-end">
          {confirmExit ? (
            <Text color="yellow" bold>
              Press Esc again to quit
            </Text>
          ) : scanError ? (
            <Text color="red">Error: {scanError}</Text>
          ) : (
            <Text color={status.startsWith("Ready") ? "white" : "green"}>{status}</Text>
          )}
        </Box>
      </Box>

      {confirmExit && <ExitConfirm rows={rows} cols={cols} />}
      {showHelp && <HelpModal rows={rows} cols={cols} />}
    </Box>
  );
};
