import type { HttpEndpoint } from '../http-index.js';
import { READ_METHODS } from '../http-methods.js';
import { httpRequestInspection } from '../groups.js';
import { headersFragment } from '../../httpbin-compat.js';
import { writeJson } from '../../util.js';

export const headers: HttpEndpoint = {
    matchPath: (path) => path === '/headers',
    methods: READ_METHODS,
    handle: (req, res) => writeJson(res, headersFragment(req)),
    meta: {
        path: '/headers',
        description: 'Returns the request headers, with the first value of any repeated header.',
        examples: ['/headers'],
        group: httpRequestInspection
    }
};
