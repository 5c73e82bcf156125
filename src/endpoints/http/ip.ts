import type { HttpEndpoint } from '../http-index.js';
import { READ_METHODS } from '../http-methods.js';
import { httpRequestInspection } from '../groups.js';
import { originFragment } from '../../httpbin-compat.js';
import { writeJson } from '../../util.js';

export const ip: HttpEndpoint = {
    matchPath: (path) => path === '/ip',
    methods: READ_METHODS,
    handle: (req, res) => writeJson(res, originFragment(req)),
    meta: {
        path: '/ip',
        description: 'Returns the IP address of the client connection.',
        examples: ['/ip'],
        group: httpRequestInspection
    }
};
