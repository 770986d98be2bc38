const COMMON_USAGE = [
	"Usage: Valid command-line arguments are:",
	"\t[-i, --input <Path to input CSV file : str>] (Read inputs from file.)",
	"\t[-o, --output <Path to output CSV file : str>] (Specify the output file.)",
	"\t[-S, --select-output <output : int>] (Compute 0-indexed output, by default 0.)",
	"\t[-M, --multiple-executions <Number of executions : int (Default: 1)>] (Repeated execute kernel for benchmarking.)",
	"\t[-T, --time] (Timing mode: Times and prints the timing of the kernel execution.)",
	"\t[-v, --verbose] (Verbose mode: Prints extra information about demo execution.)",
	"\t[-b, --benchmarking] (Benchmarking mode: Generate outputs in format for benchmarking.)",
	"\t[-j, --json] (Print output in JSON format.)",
	"\t[-h, --help] (Display this help message.)",
];

/** Usage text for the common options, one option per line */
export function formatCommonUsage(): string {
	return `${COMMON_USAGE.join("\n")}\n`;
}

/** Write the common usage text to stderr */
export function printCommonUsage(): void {
	process.stderr.write(formatCommonUsage());
}
