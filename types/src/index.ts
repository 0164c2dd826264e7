/**
 * @mewpath/types
 *
 * Shared TypeScript type definitions for the mewpath packages.
 */

// G-code types
export * from "./gcode-types";

// Geometry types
export * from "./geometry-types";

// Conversion types
export * from "./options-types";
