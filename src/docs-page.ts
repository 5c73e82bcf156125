import _ from 'lodash';

import { httpEndpoints } from './endpoints/endpoint-index.js';
import type { EndpointMeta, EndpointGroup } from './endpoints/groups.js';

interface GroupedEndpoints {
    group: EndpointGroup;
    endpoints: EndpointMeta[];
}

const GENERAL_GROUP: EndpointGroup = {
    id: 'general',
    name: 'General'
};

function groupEndpoints(endpoints: Array<{ meta?: EndpointMeta }>): GroupedEndpoints[] {
    const withMeta = endpoints.flatMap(e => e.meta ? [e.meta] : []);
    const byGroup = _.groupBy(withMeta, meta => meta.group?.id ?? GENERAL_GROUP.id);

    const groups = Object.values(byGroup).map((metas) => ({
        group: metas[0].group ?? GENERAL_GROUP,
        endpoints: _.sortBy(metas, meta => meta.path)
    }));

    // Ungrouped endpoints first, then groups alphabetically
    return _.sortBy(groups, [
        g => g.group.id === GENERAL_GROUP.id ? 0 : 1,
        g => g.group.name
    ]);
}

// Formatting only: every input here is a compiled-in string.
function escapeHtml(text: string): string {
    return text
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;');
}

function renderExample(example: string): string {
    const escaped = escapeHtml(example);
    return `<a href="${escaped}" class="example-link" target="_blank"><code>${escaped}</code></a>`;
}

function renderEndpoint(meta: EndpointMeta): string {
    const examples = meta.examples ?? [];
    const otherExamples = examples.filter(ex => ex !== meta.path);

    const pathHtml = examples.includes(meta.path)
        ? renderExample(meta.path).replace('<code>', '<code class="path">')
        : `<code class="path">${escapeHtml(meta.path)}</code>`;

    const examplesHtml = otherExamples.length > 0
        ? `<span class="examples">${otherExamples.map(renderExample).join(' ')}</span>`
        : '';

    return `
        <div class="endpoint">
            ${pathHtml}
            <span class="desc">${escapeHtml(meta.description)}</span>${examplesHtml}
        </div>`;
}

function renderEndpointGroup({ group, endpoints }: GroupedEndpoints): string {
    if (group.id === GENERAL_GROUP.id) {
        return endpoints.map(renderEndpoint).join('\n');
    }

    const descriptionHtml = group.description
        ? `<p class="group-description">${escapeHtml(group.description)}</p>`
        : '';

    return `
        <details class="endpoint-group" id="${group.id}" open>
            <summary>${escapeHtml(group.name)} <span class="count">(${endpoints.length})</span></summary>
            <div class="group-content">
                ${descriptionHtml}
                ${endpoints.map(renderEndpoint).join('\n')}
            </div>
        </details>`;
}

const CSS = `
<style>
    :root {
        --accent-color: #2b6cb0;
        --text-color: #1a202c;
        --text-muted: #4a5568;
        --bg-color: #f7fafc;
        --bg-card: #ffffff;
        --code-bg: #edf2f7;
        --border-color: #e2e8f0;
    }

    @media (prefers-color-scheme: dark) {
        :root {
            --accent-color: #63b3ed;
            --text-color: #edf2f7;
            --text-muted: #a0aec0;
            --bg-color: #1a202c;
            --bg-card: #2d3748;
            --code-bg: #4a5568;
            --border-color: #4a5568;
        }
    }

    body {
        font-family: -apple-system, BlinkMacSystemFont, "Segoe UI", Roboto, Arial, sans-serif;
        line-height: 1.6;
        color: var(--text-color);
        background: var(--bg-color);
        max-width: 860px;
        margin: 0 auto;
        padding: 2rem;
    }
    h1 {
        border-bottom: 2px solid var(--text-muted);
        padding-bottom: 1rem;
    }
    code {
        background: var(--code-bg);
        padding: 0.1rem 0.3rem;
        border-radius: 3px;
        font-family: Consolas, "Liberation Mono", Menlo, monospace;
        font-size: 0.9em;
    }
    a {
        color: var(--accent-color);
        text-decoration: none;
    }
    .endpoint-group {
        margin: 0.75rem 0;
        border: 1px solid var(--border-color);
        border-radius: 4px;
        background: var(--bg-card);
    }
    .endpoint-group > summary {
        padding: 0.4rem 0.75rem;
        cursor: pointer;
        font-weight: 600;
    }
    .endpoint-group .count {
        color: var(--text-muted);
        font-weight: normal;
        font-size: 0.8rem;
    }
    .group-content {
        padding: 0.25rem 0.75rem;
    }
    .group-description {
        margin: 0.25rem 0;
        color: var(--text-muted);
    }
    .endpoint {
        padding: 0.3rem 0;
        border-bottom: 1px solid var(--border-color);
    }
    .endpoint:last-child {
        border-bottom: none;
    }
    .endpoint .path {
        font-weight: 600;
    }
    .endpoint .desc {
        color: var(--text-muted);
        margin-left: 0.5rem;
    }
    .endpoint .examples {
        margin-left: 0.75rem;
        font-size: 0.85em;
    }
    .endpoint .examples .example-link {
        margin-right: 0.75rem;
    }
</style>
`;

// Built on first use, since the endpoint list isn't complete while this module loads
export const getDocsHtml = _.once((): string => `<!DOCTYPE html>
<html lang="en">
<head>
    <meta charset="UTF-8">
    <meta name="viewport" content="width=device-width, initial-scale=1.0">
    <title>HTTPBin Fixtures</title>
    ${CSS}
</head>
<body>
    <h1>HTTPBin Fixtures</h1>
    <p>An HTTP request &amp; response service for testing HTTP clients. Every endpoint returns a fixed or predictable response, so tests can assert exactly what comes back.</p>
    <p>Endpoints without an explicit method list accept <code>GET</code> and <code>HEAD</code> only.</p>

    ${groupEndpoints(httpEndpoints).map(renderEndpointGroup).join('\n')}
</body>
</html>`);
