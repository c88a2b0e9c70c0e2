export class ConfigError extends Error {
	key: string;
	constructor(key: string, message: string) {
		super(message);
		this.name = "ConfigError";
		this.key = key;
	}
}
