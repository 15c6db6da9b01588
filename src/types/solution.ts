/**
 * Solution file type definitions
 */

/**
 * One `Project(...) ... EndProject` block of a solution file
 */
export interface SolutionFileProject {
    readonly name: string;
    /** Path relative to the solution directory, after any type-specific correction */
    readonly path: string;
    /** Project type GUID without braces, as written in the file */
    readonly typeGuid: string;
    readonly uniqueGuid: string;
}

/**
 * Fields of a project reference line: `Project("{TYPE}") = "NAME", "PATH", "{UNIQUE}"`
 */
export interface SolutionProjectHeader {
    readonly name: string;
    readonly path: string;
    readonly typeGuid: string;
    readonly uniqueGuid: string;
}
