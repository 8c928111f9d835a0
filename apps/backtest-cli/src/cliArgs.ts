export type ArgValue = string | boolean;

export type ArgMap = Record<string, ArgValue>;

export const parseCliArgs = (argv: string[]): ArgMap => {
	const args: ArgMap = {};
	const positionals: string[] = [];
	for (let i = 0; i < argv.length; i++) {
		const token = argv[i];
		if (!token.startsWith("--")) {
			positionals.push(token);
			continue;
		}
		const eqIdx = token.indexOf("=");
		if (eqIdx !== -1) {
			const key = token.slice(2, eqIdx);
			const value = token.slice(eqIdx + 1);
			args[key] = value;
			continue;
		}
		const key = token.slice(2);
		const next = argv[i + 1];
		if (next && !next.startsWith("--")) {
			args[key] = next;
			i += 1;
		} else {
			args[key] = true;
		}
	}
	if (positionals[0] && args.bars === undefined) {
		args.bars = positionals[0];
	}
	return args;
};

export const readStringArg = (args: ArgMap, key: string): string | undefined => {
	const value = args[key];
	if (value === undefined) {
		return undefined;
	}
	if (typeof value !== "string") {
		throw new Error(`--${key} needs a value`);
	}
	return value;
};

export const readNumberArg = (args: ArgMap, key: string): number | undefined => {
	const value = readStringArg(args, key);
	if (value === undefined) {
		return undefined;
	}
	const num = Number(value);
	if (!Number.isFinite(num)) {
		throw new Error(`Invalid numeric value for --${key}: ${value}`);
	}
	return num;
};

export const readFlag = (args: ArgMap, key: string): boolean =>
	args[key] === true || args[key] === "true";
