/**
 * highlight-rules - Rule-driven text highlighting for editable text surfaces.
 *
 * Turns plain text and an ordered list of regex → style rules into styled
 * runs, and keeps a host text widget styled as the user types without
 * disturbing the cursor, the selection or the pending typing attributes.
 *
 * @packageDocumentation
 *
 * @example
 * import { HighlightedEditor, MARKDOWN_RULES, MemoryTextSurface, createTextBinding } from 'highlight-rules';
 *
 * const surface = new MemoryTextSurface();
 * const editor = new HighlightedEditor(surface, {
 *   binding: createTextBinding('# Notes\n*draft*'),
 *   rules: MARKDOWN_RULES,
 *   onSelectionChange: (ranges) => console.log(ranges),
 * });
 */

// ─────────────────────────────────────────────────────────────
// Highlighting
// ─────────────────────────────────────────────────────────────

export { AttributeRuns, attributesEqual } from './highlighting/attribute-runs.js';
export { highlight } from './highlighting/highlighter.js';
export { findMatches, getMatchRange, resolveTargetRange } from './highlighting/match-utils.js';
export { buildFlags, type CompiledPattern, canMatchEmpty, compilePattern } from './highlighting/pattern.js';
export {
    type CompiledRule,
    compileRule,
    compileRuleSet,
    concatRuleSets,
    type RuleSet,
} from './highlighting/rule-set.js';
export { formatValidationReport, validateRules } from './highlighting/rule-validator.js';
export { findStyledRanges, getAttributesAt, getRunText, styledTextEquals } from './highlighting/styled-text.js';

// ─────────────────────────────────────────────────────────────
// Editor binding
// ─────────────────────────────────────────────────────────────

export {
    createTextBinding,
    firstRangeListener,
    HighlightedEditor,
    type HighlightedEditorOptions,
    type Scheduler,
    type TextBinding,
} from './editor/highlighted-editor.js';
export { createListenerRegistry, type Listener, type ListenerRegistry, type Unsubscribe } from './editor/listeners.js';
export { MemoryTextSurface, type MemoryTextSurfaceOptions } from './editor/memory-surface.js';
export { caretAt, clampSelection, isSelectionInBounds, selectionEquals } from './editor/selection.js';
export type { SurfaceEvent, SurfaceEvents, TextSurface } from './editor/surface.js';
export { applyUpdate, createUpdateState, type UpdateContext, type UpdateState } from './editor/updater.js';

// ─────────────────────────────────────────────────────────────
// Rendering & host adapters
// ─────────────────────────────────────────────────────────────

export { TextareaSurface, type TextareaSurfaceOptions } from './dom/textarea-surface.js';
export { type AttributesToCss, type CssStyle, cssDeclarations, escapeHtml, renderStyledTextToHtml } from './render/html.js';

// ─────────────────────────────────────────────────────────────
// Presets
// ─────────────────────────────────────────────────────────────

export * from './presets/index.js';

// ─────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────

export type {
    AttributeMap,
    Attributes,
    DynamicStyle,
    HighlightOptions,
    Logger,
    MutationContext,
    PatternOptions,
    PatternRule,
    RuleValidationIssue,
    RuleValidationIssueType,
    RuleValidationResult,
    SelectionRange,
    StaticStyle,
    StyledText,
    StyleMutation,
    StyleRun,
    StyleTarget,
    TextRange,
} from './types/index.js';
