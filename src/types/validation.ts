export type RuleValidationIssueType = 'empty_pattern' | 'invalid_pattern' | 'duplicate' | 'zero_length' | 'no_styles';

export type RuleValidationIssue = {
    type: RuleValidationIssueType;
    message: string;
    suggestion?: string;
    /** Index of the earlier rule this one duplicates (for `duplicate`) */
    duplicateOf?: number;
};

/**
 * Issues found for one rule. `undefined` in the parallel results array means
 * the rule is clean.
 */
export type RuleValidationResult = {
    issues: RuleValidationIssue[];
};
