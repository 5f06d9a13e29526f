/**
 * Merge Types — Templates In, File Operations Out
 *
 * @module
 */

/** A whole file, only ever used to create a file that does not exist yet */
export interface FileTemplate {
    readonly kind: 'file';
    readonly path: string;
    readonly content: string;
}

/** Generated text for one marked region of one target file */
export interface FragmentTemplate {
    readonly kind: 'fragment';
    readonly path: string;
    readonly region: string;
    readonly content: string;
}

export type Template = FileTemplate | FragmentTemplate;

export interface CreateOperation {
    readonly kind: 'create';
    readonly path: string;
    readonly content: string;
}

export interface PatchOperation {
    readonly kind: 'patch';
    readonly path: string;
    readonly region: string;
    /** New text between the markers, already indented and line-ended for the target */
    readonly content: string;
}

export interface SkipOperation {
    readonly kind: 'skip';
    readonly path: string;
    readonly region?: string;
    readonly reason: string;
}

export type FileOperation = CreateOperation | PatchOperation | SkipOperation;

/**
 * Snapshot of the existing target tree: project-relative POSIX path →
 * file text. Only files that exist appear.
 */
export type FileTree = ReadonlyMap<string, string>;
