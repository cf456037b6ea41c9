/**
 * Process-level side effects behind a seam so fatal paths can be exercised in tests.
 */
export type RuntimeEnv = {
	log: (message: string) => void;
	error: (message: string) => void;
	exit: (code: number) => void;
};

export const defaultRuntime: RuntimeEnv = {
	log: (message) => console.log(message),
	error: (message) => console.error(message),
	exit: (code) => process.exit(code),
};
