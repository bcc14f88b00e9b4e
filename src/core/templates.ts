// src/core/templates.ts

import type { ResolvedQsConfig } from '../schema';
import { HEADER_EXTENSIONS, SOURCE_EXTENSIONS } from '../util/fs-utils';

// ---------------------------------------------------------------------------
// Root document
// ---------------------------------------------------------------------------

export const STANDARD_SETTING_MARKERS = [
    'CMAKE_RUNTIME_OUTPUT_DIRECTORY',
    'CMAKE_ARCHIVE_OUTPUT_DIRECTORY',
] as const;

function compilerOptionsSection(compilerFlags: string): string {
    return `# Compiler options
set(CMAKE_CXX_FLAGS "\${CMAKE_CXX_FLAGS} ${compilerFlags}")
`;
}

const OUTPUT_AND_TESTING_SECTIONS = `# Output directories
set(CMAKE_RUNTIME_OUTPUT_DIRECTORY \${CMAKE_BINARY_DIR}/bin)
set(CMAKE_ARCHIVE_OUTPUT_DIRECTORY \${CMAKE_BINARY_DIR}/lib)
set(CMAKE_LIBRARY_OUTPUT_DIRECTORY \${CMAKE_BINARY_DIR}/lib)

# Include directories
include_directories(\${CMAKE_CURRENT_SOURCE_DIR}/include)

# Enable testing
enable_testing()
`;

export function cxxStandardStatement(standard: number): string {
    return `set(CMAKE_CXX_STANDARD ${standard})`;
}

export const CXX_STANDARD_REQUIRED_STATEMENT = 'set(CMAKE_CXX_STANDARD_REQUIRED ON)';

/**
 * Skeleton written by `qs init`. The first target is added afterwards.
 */
export function renderRootDocument(
    projectName: string,
    config: Pick<ResolvedQsConfig, 'cmakeMinimumVersion' | 'cxxStandard' | 'compilerFlags'>,
): string {
    return `cmake_minimum_required(VERSION ${config.cmakeMinimumVersion})
project(${projectName})

${cxxStandardStatement(config.cxxStandard)}
${CXX_STANDARD_REQUIRED_STATEMENT}

${compilerOptionsSection(config.compilerFlags)}
${OUTPUT_AND_TESTING_SECTIONS}`;
}

/**
 * Bundle appended by `qs std` when none of STANDARD_SETTING_MARKERS is present.
 */
export function renderStandardSettingsBlock(
    compilerFlags: string,
    installTargets: string[],
): string {
    const install = installTargets.length
        ? `install(TARGETS ${installTargets.join(' ')} DESTINATION bin)\n`
        : '# No targets found to install\n';

    return `
${compilerOptionsSection(compilerFlags)}
${OUTPUT_AND_TESTING_SECTIONS}
# Add install target
${install}`;
}

// ---------------------------------------------------------------------------
// Starter sources
// ---------------------------------------------------------------------------

export const STARTER_SOURCE_PATH = 'src/main.cc';

export const STARTER_MAIN_SOURCE = `#include <iostream>

int main() {
    std::cout << "Hello, World!" << std::endl;
    return 0;
}
`;

// ---------------------------------------------------------------------------
// Sub-projects
// ---------------------------------------------------------------------------

/**
 * "math-utils" -> "MathUtils"; used for the example class name.
 */
export function toTypeName(name: string): string {
    const words = name.split(/[^A-Za-z0-9]+/).filter(Boolean);
    const joined = words
        .map((w) => w.charAt(0).toUpperCase() + w.slice(1))
        .join('');
    if (!joined) return 'Module';
    return /^[0-9]/.test(joined) ? `_${joined}` : joined;
}

/**
 * "math-utils" -> "math_utils"; used for the namespace and include guard.
 */
export function toIdentifier(name: string): string {
    const id = name.replace(/[^A-Za-z0-9_]+/g, '_').replace(/^_+|_+$/g, '');
    if (!id) return 'module';
    return /^[0-9]/.test(id) ? `_${id}` : id;
}

function globList(dir: string, extensions: readonly string[]): string {
    return extensions
        .map((ext) => `    \${CMAKE_CURRENT_SOURCE_DIR}/${dir}/*${ext}`)
        .join('\n');
}

/**
 * Library document written into a sub-project directory by `qs init sub`.
 */
export function renderSubProjectDocument(
    name: string,
    config: Pick<ResolvedQsConfig, 'cmakeMinimumVersion'>,
): string {
    const id = toIdentifier(name).toUpperCase();

    return `cmake_minimum_required(VERSION ${config.cmakeMinimumVersion})
project(${name})

# Collect sources and headers
file(GLOB_RECURSE ${id}_SOURCES CONFIGURE_DEPENDS
${globList('src', SOURCE_EXTENSIONS)}
)
file(GLOB_RECURSE ${id}_HEADERS CONFIGURE_DEPENDS
${globList('include', HEADER_EXTENSIONS)}
)

add_library(${name} \${${id}_SOURCES} \${${id}_HEADERS})

# Export the public include path to dependents
target_include_directories(${name}
    PUBLIC
        $<BUILD_INTERFACE:\${CMAKE_CURRENT_SOURCE_DIR}/include>
        $<INSTALL_INTERFACE:include>
)

# Install rules
install(TARGETS ${name}
    ARCHIVE DESTINATION lib
    LIBRARY DESTINATION lib
    RUNTIME DESTINATION bin
)
install(DIRECTORY include/ DESTINATION include)
`;
}

export function subProjectHeaderPath(name: string): string {
    return `include/${name}.h`;
}

export function subProjectSourcePath(name: string): string {
    return `src/${name}.cpp`;
}

export function renderSubProjectHeader(name: string): string {
    const ns = toIdentifier(name);
    const guard = `${ns.toUpperCase()}_H`;
    const typeName = toTypeName(name);

    return `#ifndef ${guard}
#define ${guard}

namespace ${ns} {

class ${typeName} {
public:
    void hello() const;
};

} // namespace ${ns}

#endif // ${guard}
`;
}

export function renderSubProjectSource(name: string): string {
    const ns = toIdentifier(name);
    const typeName = toTypeName(name);

    return `#include "${name}.h"

#include <iostream>

namespace ${ns} {

void ${typeName}::hello() const {
    std::cout << "Hello from ${name}!" << std::endl;
}

} // namespace ${ns}
`;
}
