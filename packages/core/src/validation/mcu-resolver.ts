/**
 * @title MCU Resolver
 * @description Selects the MCU descriptor whose part-number patterns match a
 * declared part number.
 *
 * Patterns are anchored and case-insensitive. `*` and `.*` match any run of
 * characters, `?` and a lone `.` match one character, and `[..]` is a
 * character class. When several descriptors match, the pattern with the
 * longest literal prefix wins.
 *
 * @module validation
 */

import { minimatch } from "minimatch";
import type { McuDescriptor } from "../types/mcu.js";
import { AmbiguousMCUError, UnknownMCUError } from "../errors.js";

/**
 * Outcome of resolving a part number.
 */
export interface McuResolution {
	/** Matched descriptor. */
	descriptor: McuDescriptor;
	/** Pattern of the descriptor that matched best. */
	pattern: string;
	/** Part number as declared (trimmed). */
	partNumber: string;
}

/**
 * Rewrite a part-number pattern as a glob.
 *
 * @example
 * ```ts
 * toGlobPattern("STM32F407V.*"); // "STM32F407V*"
 * toGlobPattern("STM32F10.C8");  // "STM32F10?C8"
 * ```
 */
export function toGlobPattern(pattern: string): string {
	return pattern.trim().replace(/\.\*/g, "*").replace(/\./g, "?");
}

/**
 * Characters of a pattern before its first wildcard.
 */
export function literalPrefix(pattern: string): string {
	const glob = toGlobPattern(pattern);
	const wildcard = glob.search(/[*?[]/);
	return wildcard === -1 ? glob : glob.slice(0, wildcard);
}

/**
 * Check whether a part number matches a pattern.
 */
export function matchesPartNumber(pattern: string, partNumber: string): boolean {
	return minimatch(partNumber.trim(), toGlobPattern(pattern), {
		nocase: true,
		nonegate: true,
		nocomment: true,
		nobrace: true,
	});
}

/**
 * Resolve a part number against the registered descriptors.
 *
 * @param partNumber - Declared MCU part number, e.g. "STM32F407VGT6"
 * @param descriptors - Registered descriptors
 * @returns The single best-matching descriptor
 * @throws UnknownMCUError if nothing matches
 * @throws AmbiguousMCUError if different descriptors tie on literal prefix length
 */
export function resolveMcu(partNumber: string, descriptors: readonly McuDescriptor[]): McuResolution {
	const part = partNumber.trim();
	if (part === "") {
		throw new UnknownMCUError(part);
	}

	let bestLength = -1;
	let best: { descriptor: McuDescriptor; pattern: string }[] = [];

	for (const descriptor of descriptors) {
		for (const pattern of descriptor.patterns) {
			if (!matchesPartNumber(pattern, part)) {
				continue;
			}
			const length = literalPrefix(pattern).length;
			if (length > bestLength) {
				bestLength = length;
				best = [{ descriptor, pattern }];
			} else if (length === bestLength) {
				best.push({ descriptor, pattern });
			}
		}
	}

	if (best.length === 0) {
		throw new UnknownMCUError(part);
	}

	const tied = [...new Set(best.map((match) => match.descriptor))];
	if (tied.length > 1) {
		throw new AmbiguousMCUError(
			part,
			tied.map((descriptor) => descriptor.name),
		);
	}

	return { descriptor: best[0].descriptor, pattern: best[0].pattern, partNumber: part };
}
