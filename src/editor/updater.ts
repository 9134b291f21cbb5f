/**
 * Selection-preserving update of a host surface.
 *
 * Re-styling replaces the whole styled content of the surface, which many
 * toolkits answer by moving the caret or resetting typing attributes. The
 * update captures both first and puts them back afterwards, with the
 * `updating` flag raised so that notifications fired in between are not
 * mistaken for user activity.
 *
 * @module updater
 */

import { highlight } from '../highlighting/highlighter.js';
import type { RuleSet } from '../highlighting/rule-set.js';
import type { AttributeMap, Attributes, StyledText } from '../types/index.js';
import type { Logger } from '../types/options.js';
import { clampSelection, isSelectionInBounds } from './selection.js';
import type { TextSurface } from './surface.js';

/**
 * Re-entrancy state shared by an update and every callback it may trigger.
 */
export type UpdateState = {
    updating: boolean;
};

/**
 * Everything one update needs. Passed explicitly rather than read from the
 * surface so the same surface can be driven by different bindings.
 */
export type UpdateContext<A extends AttributeMap> = {
    /** Re-entrancy flag; callbacks reachable from the surface must check it */
    state: UpdateState;
    /** Text to style: the bound value, which is the ground truth */
    text: string;
    rules: RuleSet<A>;
    baseAttributes?: Attributes<A>;
    logger?: Logger;
    /** Called after the styled text is installed, before the selection is restored */
    introspect?: (surface: TextSurface<A>) => void;
};

export const createUpdateState = (): UpdateState => ({ updating: false });

/**
 * Re-styles a surface without disturbing its selection or typing attributes.
 *
 * Steps:
 * 1. Raise `state.updating` (a call made while it is raised returns `undefined`)
 * 2. Capture the selection ranges and typing attributes
 * 3. Highlight `context.text` with `context.rules`
 * 4. Install the styled text, then run `introspect`
 * 5. Restore the selection (clamped to the new text) and typing attributes
 * 6. Lower `state.updating`, even when the surface throws
 *
 * @param surface - Host surface to update
 * @param context - Text, rules and re-entrancy state
 * @returns The installed styled text, or `undefined` for a re-entrant call
 *
 * @example
 * const state = createUpdateState();
 * surface.on('selection-changed', (ranges) => {
 *   if (!state.updating) notifyApp(ranges);
 * });
 * applyUpdate(surface, { rules: MARKDOWN_RULES, state, text: binding.get() });
 */
export const applyUpdate = <A extends AttributeMap>(
    surface: TextSurface<A>,
    context: UpdateContext<A>,
): StyledText<A> | undefined => {
    const { state, text, rules, baseAttributes, logger, introspect } = context;

    if (state.updating) {
        logger?.debug?.('[update] skipped re-entrant update');
        return undefined;
    }

    state.updating = true;
    try {
        const selection = surface.getSelection();
        const typingAttributes = surface.getTypingAttributes();

        const styled = highlight(text, rules, { baseAttributes, logger });
        surface.setStyledText(styled);
        introspect?.(surface);

        if (isSelectionInBounds(selection, text.length)) {
            surface.setSelection(selection);
        } else {
            logger?.debug?.('[update] selection out of bounds, clamping', { length: text.length, selection });
            surface.setSelection(clampSelection(selection, text.length));
        }
        surface.setTypingAttributes(typingAttributes);

        logger?.trace?.('[update] done', { runs: styled.runs.length, selection });
        return styled;
    } finally {
        state.updating = false;
    }
};
