/** This error is thrown when logger options hold a value the logger cannot use. */
export class LogConfigError extends Error {
	option: string;

	constructor(option: string, detail: string) {
		super(`Invalid logger option "${option}": ${detail}`);
		this.option = option;
		this.name = 'LogConfigError';
		Object.setPrototypeOf(this, LogConfigError.prototype);
	}
}
