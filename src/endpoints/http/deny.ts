import type { HttpEndpoint, HttpHandler } from '../http-index.js';
import { READ_METHODS } from '../http-methods.js';
import { httpContentExamples } from '../groups.js';

const DENIED_BODY = `
          .-''''''-.
        .' _      _ '.
       /   O      O   \\
      :                :
      |                |
      :       __       :
       \\  .-"'  '"-.  /
        '.          .'
          '-......-'
     YOU SHOULDN'T BE HERE
`;

const matchPath = (path: string) => path === '/deny';

const handle: HttpHandler = (_req, res) => {
    res.writeHead(200, { 'content-type': 'text/plain' });
    res.end(DENIED_BODY);
}

export const deny: HttpEndpoint = {
    matchPath,
    methods: READ_METHODS,
    handle,
    meta: {
        path: '/deny',
        description: 'Returns a page that robots.txt disallows.',
        examples: ['/deny'],
        group: httpContentExamples
    }
};
