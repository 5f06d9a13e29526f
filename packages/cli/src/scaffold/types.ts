/**
 * Scaffolder Types
 *
 * @module
 */

/** Settings for a new project */
export interface ProjectConfig {
    /** npm package name, also the directory name */
    readonly name: string;
    /** Region marker prefix written into the templates */
    readonly markerPrefix: string;
}

/**
 * Runs a shell command in a directory. Injectable so tests never spawn
 * processes.
 */
export type CommandRunner = (command: string, cwd: string) => void;

/** `my-api`, `users.service`, `api_v2` */
export const PROJECT_NAME_PATTERN = /^[a-z0-9][a-z0-9._-]*$/;
