import type { LanguageMode } from '../types/config';
import type { FeatureCatalog } from './feature-catalog';

const INDENT = ' '.repeat(4);

export function mainSourceFileName(projectName: string, languageMode: LanguageMode): string {
  return `${projectName}.${languageMode === 'cpp' ? 'cpp' : 'c'}`;
}

/**
 * Render the project's main source file.
 *
 * Includes, define blocks and initialiser blocks all follow the order of
 * `effectiveFeatures`: a later block may rely on pin function selects made by
 * an earlier one. The text compiles as both C and C++; the language mode
 * only decides the file name (see `mainSourceFileName`).
 */
export function renderMainSource(
  effectiveFeatures: readonly string[],
  _languageMode: LanguageMode,
  catalog: FeatureCatalog
): string {
  let text = '#include <stdio.h>\n#include "pico/stdlib.h"\n';

  if (effectiveFeatures.length > 0) {
    for (const key of effectiveFeatures) {
      const headerPath = catalog.lookup(key)?.headerPath;
      if (headerPath) {
        text += `#include "${headerPath}"\n`;
      }
    }

    text += '\n';

    for (const key of effectiveFeatures) {
      const fragment = catalog.fragment(key);
      if (fragment) {
        for (const line of fragment.defineLines) {
          text += `${line}\n`;
        }
        text += '\n';
      }
    }
  }

  text += '\n\nint main()\n{\n' + `${INDENT}stdio_init_all();\n\n`;

  for (const key of effectiveFeatures) {
    const fragment = catalog.fragment(key);
    if (fragment) {
      for (const line of fragment.initLines) {
        text += `${INDENT}${line}\n`;
      }
    }
    text += '\n';
  }

  text += `${INDENT}puts("Hello, world!");\n\n` + `${INDENT}return 0;\n` + '}\n';

  return text;
}
