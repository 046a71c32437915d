// Project descriptor (POM) parser over fast-xml-parser
// FORMAT THEOREM: parse(text) = Right(d) ⇒ text is well-formed XML with root <project>
// PURITY: CORE (string in, Either out)
// INVARIANT: Element text is kept verbatim (no numeric coercion: "1.0" stays "1.0")
// COMPLEXITY: O(n) where n = |text|

import { Either } from "effect";
import { XMLParser, XMLValidator } from "fast-xml-parser";

import { DescriptorParseError } from "../errors.js";
import type {
	DeclaredCoordinates,
	ProjectDescriptor,
} from "../types/descriptor.js";

type XmlNode = string | XmlElement | XmlNode[];

interface XmlElement {
	readonly [key: string]: XmlNode;
}

const ROOT_ELEMENT = "project";

const parser = new XMLParser({
	ignoreAttributes: true,
	ignoreDeclaration: true,
	ignorePiTags: true,
	parseTagValue: false,
	trimValues: true,
});

const isElement = (node: XmlNode | undefined): node is XmlElement =>
	typeof node === "object" && !Array.isArray(node);

/**
 * First occurrence of a repeated element.
 */
function first(node: XmlNode | undefined): string | XmlElement | undefined {
	if (Array.isArray(node)) {
		const [head] = node;
		return first(head);
	}
	return typeof node === "string" || isElement(node) ? node : undefined;
}

function text(element: XmlElement, key: string): string | undefined {
	const node = first(element[key]);
	return typeof node === "string" ? node : undefined;
}

function coordinatesOf(element: XmlElement): DeclaredCoordinates {
	return {
		groupId: text(element, "groupId"),
		artifactId: text(element, "artifactId"),
		version: text(element, "version"),
	};
}

/**
 * Projects the parsed <project> element onto {@link ProjectDescriptor}.
 *
 * An empty `<parent/>` still counts as a declared parent without coordinates.
 */
function toDescriptor(project: XmlElement): ProjectDescriptor {
	const parentNode = first(project["parent"]);
	const parent =
		parentNode === undefined
			? undefined
			: coordinatesOf(isElement(parentNode) ? parentNode : {});
	return {
		...coordinatesOf(project),
		...(parent === undefined ? {} : { parent }),
	};
}

/**
 * Parses descriptor text into a {@link ProjectDescriptor}.
 *
 * @returns Left(DescriptorParseError) for malformed XML or a root other than <project>
 *
 * @pure true
 * @example
 * ```ts
 * parseProjectDescriptor("<project><parent><groupId>g</groupId></parent></project>");
 * // Right({ parent: { groupId: "g", ... }, ... })
 * ```
 */
export function parseProjectDescriptor(
	source: string,
): Either.Either<ProjectDescriptor, DescriptorParseError> {
	const validation = XMLValidator.validate(source);
	if (validation !== true) {
		const { msg, line, col } = validation.err;
		// Errors before the first tag (empty input) come without a column.
		return Either.left(
			new DescriptorParseError({
				message: msg,
				line: typeof line === "number" ? line : 1,
				column: typeof col === "number" ? col : 1,
			}),
		);
	}

	const document: XmlNode = parser.parse(source);
	const root = isElement(document) ? first(document[ROOT_ELEMENT]) : undefined;
	if (root === undefined) {
		return Either.left(
			new DescriptorParseError({
				message: `Expected root element <${ROOT_ELEMENT}>`,
				line: 1,
				column: 1,
			}),
		);
	}
	return Either.right(toDescriptor(isElement(root) ? root : {}));
}
