/**
 * Built-in default templates
 * Used when no user template is configured
 */

/**
 * Markdown journal: one section per day, one sub-section per workout.
 * Table lines are prepared by the journal module.
 */
export function getDefaultJournalTemplate(): string {
  return `# {{{heading}}}
{{#if days.length}}
{{#each days}}

## {{{heading}}}
{{#each workouts}}

### {{{title}}}
{{#if weather}}
**Weather:** {{{weather}}}
{{/if}}
{{#if comments}}
**Comments:** {{{comments}}}
{{/if}}
{{#if table}}

{{#each table}}
{{{this}}}
{{/each}}
{{/if}}
{{/each}}
{{/each}}
{{else}}

No workouts processed or found to journal.
{{/if}}
`;
}
