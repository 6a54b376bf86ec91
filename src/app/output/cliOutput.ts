type Writer = {
	write: (chunk: string) => unknown;
};

export type CliOutputOptions = {
	/** Prefix for diagnostic lines, e.g. `find-skills`. */
	command: string;
	verbose: boolean;
	stdout: Writer;
	stderr: Writer;
};

export type CliOutput = {
	/** Primary output on stdout. */
	print: (text: string) => void;
	printJson: (data: unknown) => void;
	/** Diagnostics on stderr; `log` only when verbose. */
	log: (message: string) => void;
	warn: (message: string) => void;
	error: (message: string) => void;
};

function writeLine(writer: Writer, line: string): void {
	writer.write(line.endsWith('\n') ? line : `${line}\n`);
}

export function createCliOutput(options: CliOutputOptions): CliOutput {
	const prefix = `[${options.command}]`;

	return {
		print(text) {
			writeLine(options.stdout, text);
		},
		printJson(data) {
			writeLine(options.stdout, JSON.stringify(data, null, 2));
		},
		log(message) {
			if (!options.verbose) return;
			writeLine(options.stderr, `${prefix} ${message}`);
		},
		warn(message) {
			writeLine(options.stderr, `${prefix} warning: ${message}`);
		},
		error(message) {
			writeLine(options.stderr, `${prefix} error: ${message}`);
		},
	};
}
