// Test data builders for descriptors and utilities

/**
 * Minimal POM text; `parent` is omitted when undefined.
 */
export function pomXml(options: {
	readonly parent?: {
		readonly groupId: string;
		readonly artifactId: string;
		readonly version?: string;
	};
	readonly groupId?: string;
	readonly artifactId?: string;
}): string {
	const parent =
		options.parent === undefined
			? ""
			: [
					"  <parent>",
					`    <groupId>${options.parent.groupId}</groupId>`,
					`    <artifactId>${options.parent.artifactId}</artifactId>`,
					...(options.parent.version === undefined
						? []
						: [`    <version>${options.parent.version}</version>`]),
					"  </parent>",
				].join("\n");
	return [
		'<?xml version="1.0" encoding="UTF-8"?>',
		'<project xmlns="http://maven.apache.org/POM/4.0.0">',
		"  <modelVersion>4.0.0</modelVersion>",
		parent,
		`  <groupId>${options.groupId ?? "com.test"}</groupId>`,
		`  <artifactId>${options.artifactId ?? "foo"}</artifactId>`,
		"  <version>1.0</version>",
		"</project>",
		"",
	].join("\n");
}

export const FOO_PARENT_POM = pomXml({
	parent: { groupId: "com.test", artifactId: "foo-parent", version: "1.0" },
});

export const DOGS_YAML = "The dogs:\n  - name: Rex\n  - name: Spot\n";
