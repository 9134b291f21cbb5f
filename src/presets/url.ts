import { compileRuleSet, type RuleSet } from '../highlighting/rule-set.js';
import type { PatternRule } from '../types/rules.js';
import type { PresetAttributes } from './attributes.js';
import tlds from './url-tlds.json' with { type: 'json' };

/**
 * Pattern for web addresses with or without a scheme, e.g.
 * `https://example.com/a.html?x`, `www.example.org`, `example.io`.
 *
 * Only addresses on a known top-level domain are recognised.
 */
export const URL_PATTERN = `((https?://)?((www\\.)?\\w+\\.)+(${tlds.join('|')})(\\b|/)(/\\w+\\.\\w+)*(\\?\\w+(&\\w+)*)?)`;

/**
 * Absolute URL for a matched address. Addresses without a scheme are taken
 * as `https://`.
 *
 * @returns The normalised URL, or `undefined` when it does not parse
 *
 * @example
 * toAbsoluteUrl('www.example.com')      // 'https://www.example.com/'
 * toAbsoluteUrl('http://example.org/a') // 'http://example.org/a'
 */
export const toAbsoluteUrl = (address: string): string | undefined => {
    const candidate = /^[a-z][a-z\d+.-]*:\/\//i.test(address) ? address : `https://${address}`;
    return URL.canParse(candidate) ? new URL(candidate).href : undefined;
};

export const urlRules = (): PatternRule<PresetAttributes>[] => [
    {
        name: 'url',
        regex: URL_PATTERN,
        styles: [
            { key: 'underline', value: true },
            { compute: toAbsoluteUrl, key: 'link' },
        ],
    },
];

/**
 * Compiled URL rule set. Compose it after a markdown preset so links win.
 *
 * @example
 * const rules = concatRuleSets(MARKDOWN_RULES, URL_RULES);
 */
export const createUrlRules = (): RuleSet<PresetAttributes> => compileRuleSet(urlRules());

export const URL_RULES = createUrlRules();
