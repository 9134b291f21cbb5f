/**
 * Browser text surface: a `<textarea>` for input and selection, with the
 * styled text rendered into a backdrop element layered behind it.
 *
 * The textarea is expected to have transparent text and the backdrop the same
 * font metrics, padding and scroll position; the adapter does not manage
 * layout.
 *
 * @module textarea-surface
 */

import { createListenerRegistry, type Listener, type Unsubscribe } from '../editor/listeners.js';
import { clampSelection, selectionEquals } from '../editor/selection.js';
import type { SurfaceEvent, SurfaceEvents, TextSurface } from '../editor/surface.js';
import { type AttributesToCss, renderStyledTextToHtml } from '../render/html.js';
import type { AttributeMap, Attributes, SelectionRange, StyledText } from '../types/index.js';

export type TextareaSurfaceOptions<A extends AttributeMap> = {
    textarea: HTMLTextAreaElement;
    /** Element whose content is replaced with the rendered styled text */
    backdrop: HTMLElement;
    /** Attribute → inline CSS mapping used for rendering */
    toCss: AttributesToCss<A>;
    /** @default {} */
    typingAttributes?: Attributes<A>;
};

const SELECTION_EVENTS = ['select', 'keyup', 'mouseup'] as const;

export class TextareaSurface<A extends AttributeMap = AttributeMap> implements TextSurface<A> {
    private readonly textarea: HTMLTextAreaElement;
    private readonly backdrop: HTMLElement;
    private readonly toCss: AttributesToCss<A>;
    private readonly events = createListenerRegistry<SurfaceEvents>();
    private styled: StyledText<A>;
    private typingAttributes: Attributes<A>;
    private lastSelection: SelectionRange[];

    constructor({ textarea, backdrop, toCss, typingAttributes = {} }: TextareaSurfaceOptions<A>) {
        this.textarea = textarea;
        this.backdrop = backdrop;
        this.toCss = toCss;
        this.typingAttributes = typingAttributes;
        this.styled = { runs: [], text: textarea.value };
        this.lastSelection = this.getSelection();

        textarea.addEventListener('input', this.handleInput);
        for (const type of SELECTION_EVENTS) {
            textarea.addEventListener(type, this.handleSelection);
        }
        textarea.addEventListener('focus', this.handleFocus);
        textarea.addEventListener('blur', this.handleBlur);
    }

    getText(): string {
        return this.textarea.value;
    }

    /**
     * Styled content last installed, or the raw text with no runs when the
     * user has typed since.
     */
    getStyledText(): StyledText<A> {
        const text = this.textarea.value;
        return this.styled.text === text ? this.styled : { runs: [], text };
    }

    setStyledText(styled: StyledText<A>): void {
        if (this.textarea.value !== styled.text) {
            // Assigning the value moves the caret to the end
            this.textarea.value = styled.text;
        }
        this.backdrop.innerHTML = renderStyledTextToHtml(styled, this.toCss);
        this.styled = styled;
    }

    /** A textarea has exactly one range */
    getSelection(): SelectionRange[] {
        const { selectionStart, selectionEnd } = this.textarea;
        return [{ length: Math.max(0, selectionEnd - selectionStart), start: selectionStart }];
    }

    /**
     * Applies the first range; a textarea cannot show more than one.
     */
    setSelection(ranges: SelectionRange[]): void {
        const [first] = clampSelection(ranges, this.textarea.value.length);
        if (!first) {
            return;
        }
        this.textarea.setSelectionRange(first.start, first.start + first.length);
        // Programmatic; only user activity is reported
        this.lastSelection = this.getSelection();
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

    /**
     * Removes every DOM listener and subscriber.
     */
    dispose(): void {
        this.textarea.removeEventListener('input', this.handleInput);
        for (const type of SELECTION_EVENTS) {
            this.textarea.removeEventListener(type, this.handleSelection);
        }
        this.textarea.removeEventListener('focus', this.handleFocus);
        this.textarea.removeEventListener('blur', this.handleBlur);
        this.events.clear();
    }

    private emitSelectionIfChanged(previous = this.lastSelection) {
        const selection = this.getSelection();
        if (!selectionEquals(selection, previous)) {
            this.lastSelection = selection;
            this.events.emit('selection-changed', selection);
        }
    }

    /**
     * Typing moves the caret too. Subscribers to `text-changed` may restore the
     * selection, so the caret is compared with where it was before the input.
     */
    private readonly handleInput = () => {
        const previous = this.lastSelection;
        this.events.emit('text-changed', this.textarea.value);
        this.emitSelectionIfChanged(previous);
    };

    private readonly handleSelection = () => {
        this.emitSelectionIfChanged();
    };

    private readonly handleFocus = () => {
        this.events.emit('editing-began', undefined);
    };

    private readonly handleBlur = () => {
        this.events.emit('editing-ended', undefined);
    };
}
