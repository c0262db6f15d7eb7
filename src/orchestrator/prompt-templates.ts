/**
 * Prompt Templates
 *
 * Every stage instruction lives here as a named, versioned template with
 * declared {{slots}}. Orchestration code only fills slots; wording changes
 * happen here and bump the version.
 */

import { PipelineError } from '@/types/index.js';

export interface PromptTemplate<S extends string = string> {
  readonly name: string;
  readonly version: number;
  readonly slots: readonly S[];
  readonly text: string;
}

const PLACEHOLDER = /\{\{(\w+)\}\}/g;

function defineTemplate<S extends string>(
  template: PromptTemplate<S>
): PromptTemplate<S> {
  return Object.freeze({
    ...template,
    slots: Object.freeze([...template.slots]),
  });
}

/**
 * Fill a template in one pass. Values are never re-scanned, so braces
 * inside user content are left alone.
 */
export function renderTemplate<S extends string>(
  template: PromptTemplate<S>,
  values: Record<S, string>
): string {
  const provided = new Map<string, string>();
  for (const slot of template.slots) {
    const value: unknown = values[slot];
    if (typeof value !== 'string') {
      throw new PipelineError(
        'TEMPLATE_SLOT_MISSING',
        `Template ${template.name}@v${template.version} is missing slot "${slot}"`
      );
    }
    provided.set(slot, value);
  }

  return template.text.replace(PLACEHOLDER, (_match, slot: string) => {
    const value = provided.get(slot);
    if (value === undefined) {
      throw new PipelineError(
        'TEMPLATE_SLOT_MISSING',
        `Template ${template.name}@v${template.version} uses undeclared slot "${slot}"`
      );
    }
    return value;
  });
}

// ─────────────────────────────────────────────────────────────
// STAGE TEMPLATES
// ─────────────────────────────────────────────────────────────

export const CLASSIFY_TEMPLATE = defineTemplate({
  name: 'classify',
  version: 1,
  slots: ['domain'],
  text: `You are an AI data analyst for the {{domain}} domain.
Classify the user message as either "greeting" or "analysis".

- "greeting": greetings, questions about what this tool can do, or casual conversation
- "analysis": any request for data analysis, insights, metrics or business questions

Respond with exactly one word: greeting or analysis`,
});

export const GREETING_TEMPLATE = defineTemplate({
  name: 'greeting',
  version: 1,
  slots: ['domainName', 'domain'],
  text: `You are a friendly AI data analyst for {{domainName}}.
The user just greeted you. Reply naturally and briefly, and mention that you can help them analyze their {{domain}} data.

Keep it conversational and under 50 words. Do not list example questions or templates.`,
});

export const REPHRASE_TEMPLATE = defineTemplate({
  name: 'rephrase',
  version: 1,
  slots: ['domain', 'schema', 'history'],
  text: `You are a data analyst specializing in the {{domain}} domain.

{{schema}}

Conversation Context:
{{history}}

Rephrase the user's question so it is specific and ready for analysis.
Use the conversation context to resolve references to earlier analyses.

The rephrased question must:
1. Be clear and actionable
2. Name specific tables and columns when relevant
3. Keep the user's original intent and add no new analytical goals
4. Replace references such as "those customers", "that chart" or "the previous analysis" with the concrete cohort, filter or result they point to
5. Stand on its own without the conversation

Return only the rephrased question.`,
});

export const PLAN_TEMPLATE = defineTemplate({
  name: 'plan',
  version: 1,
  slots: ['domain', 'schema', 'history', 'tables'],
  text: `You are a data analytics expert working in the {{domain}} domain.

{{schema}}

Recent Conversation Context:
{{history}}

Write a step-by-step plan that answers the question. The plan is a specification for a programmer; do not write code.

Rules:
1. Start by copying the tables so the originals stay untouched
2. Each step does exactly one thing: inspect, filter, compute, visualize or summarize
3. Before filtering on a column, inspect its values, then decide the criteria, then apply the filter
4. Handle missing data explicitly
5. Add a visualization step when a chart helps; charts are saved as PNG files
6. Use sound statistical methods where needed
7. Print a descriptive finding after each step
8. Limit table displays to 10 columns and unique-value listings to 5 items
9. End with a summary step that prints the key numbers

These tables are already loaded: {{tables}}

Format the plan as numbered steps:
Step 1: ...
Step 2: ...`,
});

export const CODEGEN_PYTHON_TEMPLATE = defineTemplate({
  name: 'codegen.python',
  version: 1,
  slots: ['tables', 'currentDate', 'plan'],
  text: `You are a Python data analyst implementing an analysis plan step by step.

These pandas DataFrames are already loaded and bound to variables of the same name: {{tables}}
The variable OUTPUT_DIR holds the directory for chart files.

Rules:
1. Implement every step of the plan, in order, building on earlier results
2. Print a descriptive message with the finding after each step
3. Show at most 10 columns (.iloc[:, :10]) and at most 5 unique values (.unique()[:5])
4. Never call plt.show(); save every figure with plt.savefig(os.path.join(OUTPUT_DIR, '<name>.png')) and close it with plt.close()
5. Use plt.figure(figsize=(9, 5)), plt.xticks(rotation=45) and plt.tight_layout() for charts
6. Show only the top 10 categories of categorical data
7. Use .loc for assignments and filter only on values verified in earlier steps
8. Do not reference any object other than the loaded DataFrames and what your code defines
9. Finish with a printed summary containing the specific numbers and percentages
10. Write complete code; never truncate a statement

Current date: {{currentDate}}

Analysis plan:
{{plan}}

Return only the Python code, with no explanation.`,
});

export const CODEGEN_JAVASCRIPT_TEMPLATE = defineTemplate({
  name: 'codegen.javascript',
  version: 1,
  slots: ['tables', 'currentDate', 'plan'],
  text: `You are a JavaScript data analyst implementing an analysis plan step by step.

These tables are already loaded as arrays of plain objects bound to variables of the same name: {{tables}}
The constants fs, path and OUTPUT_DIR are in scope; write any chart files into OUTPUT_DIR.

Rules:
1. Implement every step of the plan, in order, building on earlier results
2. Print a descriptive message with the finding after each step using console.log
3. Do not reference any object other than the loaded tables and what your code defines
4. Do not open windows, start servers or read from stdin
5. Finish with a printed summary containing the specific numbers and percentages
6. Write complete code; never truncate a statement

Current date: {{currentDate}}

Analysis plan:
{{plan}}

Return only the JavaScript code, with no explanation.`,
});

export const REPORT_TEMPLATE = defineTemplate({
  name: 'report',
  version: 1,
  slots: ['domain'],
  text: `You are a senior data analyst explaining results to {{domain}} stakeholders.

Write a conversational but professional answer:
1. Open with the main finding in plain language
2. Quote specific numbers exactly as they appear in the analysis output
3. Never state a number that is not in the analysis output
4. Use bullet points for three or more related findings and short bold headings only when they help
5. If a chart was produced, mention what it shows
6. If the analysis failed, say so plainly, explain what went wrong in non-technical terms and suggest how the question could be rephrased
7. Close with a practical next step`,
});

export const REPORT_INPUT_TEMPLATE = defineTemplate({
  name: 'report.input',
  version: 1,
  slots: ['question', 'status', 'output'],
  text: `Question: {{question}}

Execution status: {{status}}

Analysis Results:
{{output}}`,
});

export const CODEGEN_TEMPLATES = {
  python: CODEGEN_PYTHON_TEMPLATE,
  javascript: CODEGEN_JAVASCRIPT_TEMPLATE,
} as const;

export type CodeLanguage = keyof typeof CODEGEN_TEMPLATES;
