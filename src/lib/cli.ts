// src/lib/cli.ts
// Minimal, shared CLI argument helpers.

export type ParsedArgs = {
	positionals: string[];
	flags: Set<string>;
	options: Map<string, string>;
	/** First problem met while parsing; handlers report it and exit non-zero. */
	error?: string;
};

export type ArgSpec = {
	flags?: readonly string[];
	options?: readonly string[];
};

/**
 * Split a command's arguments (command name excluded) into positionals,
 * boolean flags and `--name value` options. Unknown `--x` arguments and
 * options without a value are reported through `error`.
 */
export function parseCommandArgs(args: string[], spec: ArgSpec): ParsedArgs {
	const flags = new Set<string>();
	const options = new Map<string, string>();
	const positionals: string[] = [];
	const knownFlags = new Set(spec.flags ?? []);
	const knownOptions = new Set(spec.options ?? []);

	for (let i = 0; i < args.length; i++) {
		const a = args[i];
		if (a === undefined) continue;
		if (!a.startsWith("--")) {
			positionals.push(a);
			continue;
		}
		if (knownFlags.has(a)) {
			flags.add(a);
			continue;
		}
		if (knownOptions.has(a)) {
			const v = args[i + 1];
			if (v === undefined || v.startsWith("--")) {
				return { positionals, flags, options, error: `${a} requires a value` };
			}
			i += 1;
			options.set(a, v);
			continue;
		}
		return { positionals, flags, options, error: `Unknown option: ${a}` };
	}

	return { positionals, flags, options };
}

/** Whole number from an option value; null when it is not one. */
export function parseIntOption(raw: string): number | null {
	return /^-?\d+$/.test(raw.trim()) ? Number(raw) : null;
}
