/**
 * Project Templates — README
 *
 * @module
 */
import { markerLines } from '@apiweave/engine';
import type { ProjectConfig } from '../scaffold/types.js';

export function readme(config: ProjectConfig): string {
    const { begin, end } = markerLines('README.md', 'endpoints', config.markerPrefix);
    return `# ${config.name}

API descriptions live in \`config/openapi/*.toml\`. After editing them, run:

\`\`\`bash
apiweave generate
\`\`\`

This rewrites \`public/openapi.json\` and \`public/translations.json\`, and
refreshes the marked regions of \`src/routes.ts\`, \`src/translations.ts\`
and this README. Text outside the markers is never touched.

## Endpoints

${begin}
${end}

## Development

\`\`\`bash
npm install
npm run dev
\`\`\`
`;
}
