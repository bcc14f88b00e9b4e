// src/schema/config.ts

/**
 * C++ standards accepted by `qs std`.
 */
export const SUPPORTED_CXX_STANDARDS = [11, 14, 17, 20, 23] as const;

export type CxxStandard = (typeof SUPPORTED_CXX_STANDARDS)[number];

/**
 * Root configuration object for qs.
 *
 * This is what you export from `qs.config.ts` at the project root.
 * Every field is optional; missing fields fall back to DEFAULT_QS_CONFIG.
 */
export interface QsConfig {
    /**
     * Version written into `cmake_minimum_required(VERSION ...)` by `qs init`
     * and into sub-project documents.
     *
     * Default: "3.10"
     */
    cmakeMinimumVersion?: string;

    /**
     * C++ standard written by `qs init`.
     * `qs std <n>` overrides it per invocation.
     *
     * Default: 14
     */
    cxxStandard?: CxxStandard;

    /**
     * Flags appended to CMAKE_CXX_FLAGS in generated documents.
     *
     * Default: "-Wall -Wextra"
     */
    compilerFlags?: string;

    /**
     * Build directory, relative to the project root.
     *
     * Default: "build"
     */
    buildDir?: string;

    /**
     * Extra arguments passed to `cmake ..` during `qs build`
     * (e.g. ["-DCMAKE_BUILD_TYPE=Release"]).
     */
    cmakeArgs?: string[];

    /**
     * Command run inside the build directory after configuring.
     *
     * Default: ["make"]
     */
    buildCommand?: string[];

    /**
     * URL opened by `qs doc`.
     */
    docsUrl?: string;
}

export type ResolvedQsConfig = Required<QsConfig>;

export const DEFAULT_QS_CONFIG: ResolvedQsConfig = {
    cmakeMinimumVersion: '3.10',
    cxxStandard: 14,
    compilerFlags: '-Wall -Wextra',
    buildDir: 'build',
    cmakeArgs: [],
    buildCommand: ['make'],
    docsUrl: 'https://cmake.org/cmake/help/latest/index.html',
};

export function isCxxStandard(value: number): value is CxxStandard {
    return SUPPORTED_CXX_STANDARDS.some((std) => std === value);
}

/**
 * Parse a command-line standard such as "17". Only plain digits are
 * accepted, so "17abc" or "1.7e1" give undefined.
 */
export function parseCxxStandard(value: string): CxxStandard | undefined {
    if (!/^\d+$/.test(value)) return undefined;
    const parsed = Number(value);
    return isCxxStandard(parsed) ? parsed : undefined;
}
