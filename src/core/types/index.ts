// Single import point for CORE type definitions

export type { TransformationContext } from "./context.js";
export type { CoordinateTriple } from "./coordinates.js";
export type {
	DeclaredCoordinates,
	ProjectDescriptor,
} from "./descriptor.js";
export type {
	AbsoluteLocation,
	RelativeLocation,
	UtilityLocation,
} from "./location.js";
