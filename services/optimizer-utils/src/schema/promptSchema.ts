import { z } from 'zod';
import { MissingVariableError } from '../errors';
import { createVariableHealer } from '../healing/healer';
import { extractVariables, placeholder } from '../healing/variables';

const ANALYSIS_DESCRIPTION =
  'First, analyze the current results and plan improvements to reconcile them.';

const IMPROVED_PROMPT_DESCRIPTION =
  'Finally, generate the full updated prompt to address the identified issues.' +
  ' Wrap the section you rewrote in <TO_OPTIMIZE> and </TO_OPTIMIZE> tags; the tags are removed' +
  ' before the prompt is used, so keep everything else in template format.';

/** Variable guidance appended to the `improved_prompt` description. */
export function describePromptVariables(originalPrompt: string): string {
  const required = extractVariables(originalPrompt);
  if (required.length === 0) {
    return (
      'The prompt section being optimized contains no input template variables.' +
      ' Any brackets {{ foo }} you emit will be escaped and treated as literal text.'
    );
  }
  const listed = required.map(placeholder).join(', ');
  return (
    `The prompt section being optimized contains the following template variables: ${listed}.` +
    ' You must retain all of these variables in your improved prompt. No other input variables are allowed.'
  );
}

const optimizedPromptShape = {
  analysis: z.string(),
  improved_prompt: z.string(),
};

/**
 * Structured-output contract for one optimizer step on `originalPrompt`.
 *
 * Before the object is validated, `improved_prompt` goes through the variable healer: every
 * `{name}` found in `originalPrompt` must be present, stray braces are escaped and the
 * `<TO_OPTIMIZE>` tags are stripped. A missing variable is reported as a custom issue on
 * `improved_prompt`, carrying `params.missingVariables`.
 */
export function buildPromptSchema(originalPrompt: string) {
  const healer = createVariableHealer(extractVariables(originalPrompt), { allRequired: true });

  const output = z.object({
    analysis: optimizedPromptShape.analysis.describe(ANALYSIS_DESCRIPTION),
    improved_prompt: optimizedPromptShape.improved_prompt.describe(
      `${IMPROVED_PROMPT_DESCRIPTION} ${describePromptVariables(originalPrompt)}`,
    ),
  });

  return z.preprocess((data, ctx) => {
    if (!isRecord(data)) return data;
    const candidate = data.improved_prompt;
    if (typeof candidate !== 'string') return data;
    try {
      return { ...data, improved_prompt: healer.pipe(candidate) };
    } catch (err) {
      if (!(err instanceof MissingVariableError)) throw err;
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['improved_prompt'],
        message: err.message,
        params: { code: err.code, missingVariables: err.missingVariables },
      });
      return data;
    }
  }, output);
}

export type PromptSchema = ReturnType<typeof buildPromptSchema>;
export type OptimizedPromptOutput = z.infer<PromptSchema>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
