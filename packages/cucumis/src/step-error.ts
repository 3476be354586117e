// ============================================================================
// Step errors - what went wrong with a step, where, and what ran before it.
//
// Instead of: "No match for 'I have 5 cucumbers'"
// We say:     the step, its file and line, the scenario it belongs to, and a
//             ready-to-paste definition for it.
// ============================================================================

import { inspect } from 'node:util';
import type { Step } from 'cucumis-gherkin';

export type StepFailureReason = 'missing-step-definition' | 'failed-step';

export interface StepHistoryEntry {
	status: 'passed' | 'failed';
	step: Step;
}

/** Only this many of the most recent steps are kept in an error's history */
export const HISTORY_LIMIT = 10;

interface StepErrorLocation {
	step: Step;
	featureFile: string;
	scenarioName: string;
	history?: StepHistoryEntry[];
}

/**
 * Raised for a step that has no matching definition, or whose definition
 * threw. Carries the step, the feature file and scenario, and the steps that
 * ran before it.
 */
export class StepError extends Error {
	override readonly name = 'StepError';

	readonly reason: StepFailureReason;
	readonly step: Step;
	/** The pattern that matched, for `failed-step` */
	readonly pattern: string | null;
	readonly featureFile: string;
	readonly scenarioName: string;
	readonly history: StepHistoryEntry[];

	private constructor(
		message: string,
		options: StepErrorLocation & { reason: StepFailureReason; pattern: string | null; cause?: unknown },
	) {
		super(message, options.cause === undefined ? undefined : { cause: options.cause });
		this.reason = options.reason;
		this.step = options.step;
		this.pattern = options.pattern;
		this.featureFile = options.featureFile;
		this.scenarioName = options.scenarioName;
		this.history = options.history ?? [];
	}

	static missingStepDefinition(options: StepErrorLocation & { suggestions?: string[] }): StepError {
		const { step } = options;
		const parts = [
			'No matching step definition found for step:',
			'',
			`  ${step.keyword} ${step.text}`,
			'',
			`in scenario "${options.scenarioName}" (${stepLocation(options)})`,
			'',
			'Please define this step with:',
			'',
			`Step('${suggestPattern(step.text)}', (ctx) => {`,
			'  // Your step implementation here',
			'});',
		];

		if (options.suggestions && options.suggestions.length > 0) {
			parts.push('', 'Did you mean:', ...options.suggestions.map((s) => `  - ${s}`));
		}

		return new StepError(parts.join('\n'), {
			...options,
			history: recent(options.history),
			reason: 'missing-step-definition',
			pattern: null,
		});
	}

	static failedStep(options: StepErrorLocation & { pattern: string; cause: unknown }): StepError {
		const { step } = options;
		const history = recent(options.history);
		const parts = [
			'Step failed:',
			'',
			`  ${step.keyword} ${step.text}`,
			'',
			`in scenario "${options.scenarioName}" (${stepLocation(options)})`,
			`matching pattern: "${options.pattern}"`,
			'',
			describeCause(options.cause),
		];

		if (history.length > 0) {
			parts.push('', formatHistory(history));
		}

		return new StepError(parts.join('\n'), {
			...options,
			history,
			reason: 'failed-step',
		});
	}
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

/** `file:line` with the 1-based line of the step keyword */
function stepLocation({ featureFile, step }: StepErrorLocation): string {
	return `${featureFile}:${step.line + 1}`;
}

function recent(history: StepHistoryEntry[] = []): StepHistoryEntry[] {
	return history.slice(-HISTORY_LIMIT);
}

function describeCause(cause: unknown): string {
	if (cause instanceof Error) return cause.message;
	if (typeof cause === 'string') return cause;
	return inspect(cause);
}

export function formatHistory(history: StepHistoryEntry[]): string {
	const lines = history.map(({ status, step }) => `  [${status}] ${step.keyword} ${step.text}`);
	return ['Step execution history:', ...lines].join('\n');
}

/**
 * Turn step text into a pattern for a new definition: quoted strings become
 * `{string}`, decimals `{float}` and integers `{int}`. Expression syntax in
 * the remaining text is escaped, and the result is escaped again for a
 * single-quoted string literal.
 *
 * ```ts
 * suggestPattern('I add 3 "ripe" cucumbers'); // 'I add {int} {string} cucumbers'
 * ```
 */
export function suggestPattern(text: string): string {
	return text
		.replace(/[{}()/\\]/g, '\\$&')
		.replace(/"[^"]*"/g, '{string}')
		.replace(/\b\d+\.\d+\b/g, '{float}')
		.replace(/\b\d+\b/g, '{int}')
		.replace(/[\\']/g, '\\$&');
}
