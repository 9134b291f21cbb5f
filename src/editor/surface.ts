import type { AttributeMap, Attributes, SelectionRange, StyledText } from '../types/index.js';
import type { Listener, Unsubscribe } from './listeners.js';

/**
 * Notifications a host surface sends.
 *
 * - `text-changed`: the raw text changed (payload: new text)
 * - `selection-changed`: the cursor or selection moved (payload: new ranges)
 * - `editing-began` / `editing-ended`: an edit session started or finished
 */
export type SurfaceEvents = {
    'text-changed': string;
    'selection-changed': SelectionRange[];
    'editing-began': undefined;
    'editing-ended': undefined;
};

export type SurfaceEvent = keyof SurfaceEvents;

/**
 * Host-adapter interface for an editable text display.
 *
 * One implementation per platform; the engine and the updater only ever talk
 * to this interface. Setting styled content may disturb the selection or the
 * typing attributes as a side effect: the updater restores both afterwards.
 */
export interface TextSurface<A extends AttributeMap = AttributeMap> {
    /** Current raw text */
    getText(): string;
    /** Styled content last installed (or the raw text with no runs) */
    getStyledText(): StyledText<A>;
    /** Replaces the displayed content and its styling */
    setStyledText(styled: StyledText<A>): void;
    getSelection(): SelectionRange[];
    setSelection(ranges: SelectionRange[]): void;
    /** Style applied to text about to be typed */
    getTypingAttributes(): Attributes<A>;
    setTypingAttributes(attributes: Attributes<A>): void;
    /** Subscribes to a notification; returns the unsubscribe function */
    on<E extends SurfaceEvent>(event: E, listener: Listener<SurfaceEvents[E]>): Unsubscribe;
}
