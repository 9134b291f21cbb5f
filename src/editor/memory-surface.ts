/**
 * Headless, in-process text surface.
 *
 * Useful wherever there is no widget: servers, workers, tests. It behaves
 * like a typical toolkit text view: installing styled content replaces the
 * whole storage, which moves the caret to the end and resets typing
 * attributes, and every selection change (programmatic or not) is announced.
 *
 * @module memory-surface
 */

import type { AttributeMap, Attributes, SelectionRange, StyledText } from '../types/index.js';
import { createListenerRegistry, type Listener, type Unsubscribe } from './listeners.js';
import { caretAt, clampSelection } from './selection.js';
import type { SurfaceEvent, SurfaceEvents, TextSurface } from './surface.js';

export type MemoryTextSurfaceOptions<A extends AttributeMap> = {
    /** Initial text. @default '' */
    text?: string;
    /** Initial selection. @default a caret at the end of `text` */
    selection?: SelectionRange[];
    /** Initial typing attributes. @default {} */
    typingAttributes?: Attributes<A>;
    /**
     * Emulate a toolkit that moves the caret to the end and resets typing
     * attributes whenever styled content is installed.
     *
     * @default true
     */
    resetSelectionOnStyle?: boolean;
};

const toPlainStyledText = <A extends AttributeMap>(text: string, attributes: Attributes<A>): StyledText<A> => ({
    runs: text ? [{ attributes, end: text.length, start: 0 }] : [],
    text,
});

export class MemoryTextSurface<A extends AttributeMap = AttributeMap> implements TextSurface<A> {
    private styled: StyledText<A>;
    private selection: SelectionRange[];
    private typingAttributes: Attributes<A>;
    private focused = false;
    private readonly events = createListenerRegistry<SurfaceEvents>();
    private readonly resetSelectionOnStyle: boolean;

    /** How many times styled content has been installed */
    styleCount = 0;

    constructor(options: MemoryTextSurfaceOptions<A> = {}) {
        const { text = '', typingAttributes = {}, resetSelectionOnStyle = true } = options;
        this.styled = toPlainStyledText(text, typingAttributes);
        this.selection = clampSelection(options.selection ?? [caretAt(text.length)], text.length);
        this.typingAttributes = typingAttributes;
        this.resetSelectionOnStyle = resetSelectionOnStyle;
    }

    getText(): string {
        return this.styled.text;
    }

    getStyledText(): StyledText<A> {
        return this.styled;
    }

    setStyledText(styled: StyledText<A>): void {
        this.styled = styled;
        this.styleCount++;
        if (this.resetSelectionOnStyle) {
            this.typingAttributes = styled.runs.at(-1)?.attributes ?? {};
            this.changeSelection([caretAt(styled.text.length)]);
        }
    }

    getSelection(): SelectionRange[] {
        return this.selection.map((range) => ({ ...range }));
    }

    setSelection(ranges: SelectionRange[]): void {
        this.changeSelection(clampSelection(ranges, this.styled.text.length));
    }

    getTypingAttributes(): Attributes<A> {
        return this.typingAttributes;
    }

    setTypingAttributes(attributes: Attributes<A>): void {
        this.typingAttributes = attributes;
    }

    on<E extends SurfaceEvent>(event: E, listener: Listener<SurfaceEvents[E]>): Unsubscribe {
        return this.events.on(event, listener);
    }

    // ─────────────────────────────────────────────────────────────
    // User input simulation
    // ─────────────────────────────────────────────────────────────

    /** Starts an edit session (`editing-began`), like focusing the widget */
    focus(): void {
        if (!this.focused) {
            this.focused = true;
            this.events.emit('editing-began', undefined);
        }
    }

    /** Ends the edit session (`editing-ended`) */
    blur(): void {
        if (this.focused) {
            this.focused = false;
            this.events.emit('editing-ended', undefined);
        }
    }

    /**
     * Types `text` over the first selection range (or at the end when there is
     * no selection).
     */
    insert(text: string): void {
        this.replace(this.selection[0] ?? caretAt(this.styled.text.length), text);
    }

    /**
     * Replaces `range` with `text` and puts the caret after the insertion.
     *
     * The new characters carry the current typing attributes until the next
     * styling pass. Emits `text-changed`, then `selection-changed`.
     */
    replace(range: SelectionRange, text: string): void {
        const current = this.styled.text;
        const start = Math.min(Math.max(0, range.start), current.length);
        const end = Math.min(start + Math.max(0, range.length), current.length);
        const next = current.slice(0, start) + text + current.slice(end);

        this.styled = toPlainStyledText(next, this.typingAttributes);
        this.selection = [caretAt(start + text.length)];

        this.events.emit('text-changed', next);
        this.events.emit('selection-changed', this.getSelection());
    }

    /** Moves the cursor or selection, as a user click or drag would */
    select(ranges: SelectionRange[]): void {
        this.setSelection(ranges);
    }

    private changeSelection(ranges: SelectionRange[]): void {
        this.selection = ranges;
        this.events.emit('selection-changed', this.getSelection());
    }
}
