export {
	type CLICommand,
	type FindFilesCommand,
	parseCLIArgs,
	type PomParentMatchCommand,
	USAGE,
	UsageError,
} from "./cli.js";
export {
	CONFIG_FILE_NAME,
	loadUtilitiesConfig,
	type UtilitiesConfig,
	validateConfig,
} from "./loader.js";
