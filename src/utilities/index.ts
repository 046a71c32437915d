export { FindFiles, type FindFilesOptions, NO_FILES_FOUND } from "./find-files.js";
export {
	PomParentMatch,
	type PomParentMatchOptions,
} from "./pom-parent-match.js";
