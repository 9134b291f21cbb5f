/**
 * Binds a text value and a rule set to a host surface.
 *
 * The embedder owns the text (through a `TextBinding`) and the rule set; the
 * editor mirrors the text into the surface with styling, forwards host
 * notifications to the embedder's callbacks and keeps its own re-styling
 * passes invisible to them.
 *
 * @module highlighted-editor
 */

import type { RuleSet } from '../highlighting/rule-set.js';
import type { AttributeMap, Attributes, SelectionRange, StyledText } from '../types/index.js';
import type { Logger } from '../types/options.js';
import type { Unsubscribe } from './listeners.js';
import type { TextSurface } from './surface.js';
import { applyUpdate, createUpdateState, type UpdateState } from './updater.js';

/**
 * Two-way text value. The embedder holds the ground truth; the editor reads
 * it for every styling pass and writes user edits back.
 */
export type TextBinding = {
    get(): string;
    set(value: string): void;
};

/**
 * Defers a callback to a later turn of the event loop.
 */
export type Scheduler = (callback: () => void) => void;

export type HighlightedEditorOptions<A extends AttributeMap> = {
    binding: TextBinding;
    rules: RuleSet<A>;
    /** Attributes under every run, e.g. the default editor font */
    baseAttributes?: Attributes<A>;
    logger?: Logger;
    /** The text changed, by user input or through `setText()` */
    onTextChange?: (text: string) => void;
    /** The user moved the cursor or selection. Always delivered on a later turn. */
    onSelectionChange?: (ranges: SelectionRange[]) => void;
    /** An edit session began (the surface gained focus) */
    onEditingBegan?: () => void;
    /** An edit session ended (the surface lost focus) */
    onEditingEnded?: () => void;
    /** Direct access to the surface after every styling pass, for host-specific configuration */
    introspect?: (surface: TextSurface<A>) => void;
    /**
     * How selection notifications are deferred.
     *
     * @default queueMicrotask
     */
    schedule?: Scheduler;
};

/**
 * A `TextBinding` that simply holds the value.
 *
 * @example
 * const binding = createTextBinding('# Notes');
 * const editor = new HighlightedEditor(surface, { binding, rules: MARKDOWN_RULES });
 */
export const createTextBinding = (initial = ''): TextBinding => {
    let value = initial;
    return {
        get: () => value,
        set: (next) => {
            value = next;
        },
    };
};

/**
 * Adapts a callback interested only in the primary range to
 * `onSelectionChange`. Empty selections are not reported.
 *
 * @example
 * new HighlightedEditor(surface, {
 *   binding,
 *   rules,
 *   onSelectionChange: firstRangeListener((range) => showCaret(range.start)),
 * });
 */
export const firstRangeListener = (callback: (range: SelectionRange) => void) => {
    return (ranges: SelectionRange[]) => {
        const [first] = ranges;
        if (first) {
            callback(first);
        }
    };
};

export class HighlightedEditor<A extends AttributeMap = AttributeMap> {
    private readonly state: UpdateState = createUpdateState();
    private readonly subscriptions: Unsubscribe[];
    private readonly schedule: Scheduler;
    private rules: RuleSet<A>;
    private styled: StyledText<A> | undefined;
    private selection: SelectionRange[];
    private disposed = false;

    constructor(
        private readonly surface: TextSurface<A>,
        private readonly options: HighlightedEditorOptions<A>,
    ) {
        this.rules = options.rules;
        this.schedule = options.schedule ?? queueMicrotask;
        this.selection = surface.getSelection();
        this.subscriptions = [
            surface.on('text-changed', () => this.handleTextChanged()),
            surface.on('selection-changed', (ranges) => this.handleSelectionChanged(ranges)),
            surface.on('editing-began', () => this.handleEditingBegan()),
            surface.on('editing-ended', () => this.handleEditingEnded()),
        ];
        this.refresh();
    }

    /**
     * Re-styles the surface from the bound text. Running it twice with no text
     * change produces identical styled text and leaves the selection alone.
     */
    refresh(): StyledText<A> | undefined {
        if (this.disposed) {
            return undefined;
        }
        const { baseAttributes, introspect, logger } = this.options;
        const styled = applyUpdate(this.surface, {
            baseAttributes,
            introspect,
            logger,
            rules: this.rules,
            state: this.state,
            text: this.options.binding.get(),
        });
        if (styled) {
            this.styled = styled;
        }
        return styled;
    }

    /**
     * Programmatic text change from the embedder.
     */
    setText(text: string): void {
        const { binding, onTextChange } = this.options;
        const changed = binding.get() !== text;
        binding.set(text);
        if (changed) {
            onTextChange?.(text);
        }
        this.refresh();
    }

    /**
     * Swaps the rule set and re-styles.
     */
    setRules(rules: RuleSet<A>): void {
        this.rules = rules;
        this.refresh();
    }

    getStyledText(): StyledText<A> | undefined {
        return this.styled;
    }

    /** Last selection reported by the surface outside of a styling pass */
    getSelection(): SelectionRange[] {
        return this.selection.map((range) => ({ ...range }));
    }

    isUpdating(): boolean {
        return this.state.updating;
    }

    /**
     * Detaches from the surface. Later calls are no-ops.
     */
    dispose(): void {
        if (this.disposed) {
            return;
        }
        this.disposed = true;
        for (const unsubscribe of this.subscriptions) {
            unsubscribe();
        }
    }

    private syncBindingFromSurface(): string {
        const text = this.surface.getText();
        this.options.binding.set(text);
        return text;
    }

    private handleTextChanged(): void {
        if (this.state.updating) {
            return;
        }
        const text = this.syncBindingFromSurface();
        this.options.onTextChange?.(text);
        this.selection = this.surface.getSelection();
        this.refresh();
    }

    private handleSelectionChanged(ranges: SelectionRange[]): void {
        if (this.state.updating) {
            return;
        }
        this.selection = ranges.map((range) => ({ ...range }));
        const { onSelectionChange } = this.options;
        if (!onSelectionChange) {
            return;
        }
        const snapshot = this.getSelection();
        // Never synchronously: the callback may change the text, and we may be inside a pass.
        this.schedule(() => onSelectionChange(snapshot));
    }

    private handleEditingBegan(): void {
        this.syncBindingFromSurface();
        this.options.onEditingBegan?.();
    }

    private handleEditingEnded(): void {
        this.syncBindingFromSurface();
        this.options.onEditingEnded?.();
    }
}
