/**
 * Centralized Version Constants
 *
 * Import version from package.json to ensure consistency across the verifier.
 * Reported by `Verifier.status()`.
 *
 * @module version
 */

import packageJson from "../../package.json";

/**
 * Application version from package.json
 */
export const APP_VERSION: string = packageJson.version;
