/**
 * Generic runner for the check catalogue.
 *
 * Runs every applicable check for the phase in registration order, never
 * stopping early. A check that throws is recorded as FAIL; nothing escapes.
 */

import { Logger } from "../../utility/Logger.js";
import type { CheckContext, CheckDefinition, CheckResult, CheckRun } from "./types.js";

export class CheckRunner {
	private logger = Logger.getInstance();

	constructor(
		private readonly catalogue: readonly CheckDefinition[],
		private readonly clock: () => Date = () => new Date(),
	) {
		const seen = new Set<string>();
		for (const check of catalogue) {
			if (seen.has(check.name)) {
				throw new Error(`Duplicate check name in catalogue: ${check.name}`);
			}
			seen.add(check.name);
		}
	}

	run(context: CheckContext): CheckRun {
		const results: CheckResult[] = [];
		const skipped: string[] = [];

		for (const check of this.catalogue) {
			if (!check.phases.includes(context.phase)) {
				continue;
			}

			if (!this.isApplicable(check, context)) {
				this.logger.debug(`Skipped: ${check.name}`);
				skipped.push(check.name);
				continue;
			}

			const result = this.evaluate(check, context);
			this.logger.debug(`${check.name}: ${result.severity} - ${result.message}`);
			results.push(result);
		}

		return { results, skipped };
	}

	private isApplicable(check: CheckDefinition, context: CheckContext): boolean {
		try {
			return check.applies(context);
		} catch (error) {
			// Unknown applicability: run the check rather than hide it
			this.logger.warn(`Applicability test for ${check.name} threw: ${error}`);
			return true;
		}
	}

	private evaluate(check: CheckDefinition, context: CheckContext): CheckResult {
		let severity: CheckResult["severity"];
		let message: string;

		try {
			({ severity, message } = check.evaluate(context));
		} catch (error) {
			severity = "FAIL";
			message = `Check could not be evaluated: ${error instanceof Error ? error.message : String(error)}`;
		}

		return Object.freeze({
			checkName: check.name,
			title: check.title,
			severity,
			message,
			observedAt: this.clock(),
			fatalOnFail: check.fatalOnFail,
		});
	}
}
