/**
 * Registers every built-in scene preset.
 */

import "./default";
import "./metals";
import "./field";

export { defaultScene } from "./default";
export { metalsScene } from "./metals";
export { fieldScene } from "./field";
