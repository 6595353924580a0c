let verbose = false;

export function setVerbose(value: boolean) {
	verbose = value;
}

export function isVerbose(): boolean {
	return verbose;
}
