import type { HttpEndpoint, HttpHandler } from '../http-index.js';
import { READ_METHODS } from '../http-methods.js';
import { httpContentExamples } from '../groups.js';
import { readAsset } from '../../assets.js';

const buildImageEndpoint = (
    format: string,
    filename: string,
    contentType: string
): HttpEndpoint => {
    const path = `/image/${format}`;
    const image = readAsset(filename);

    const handle: HttpHandler = (_req, res) => {
        res.writeHead(200, {
            'content-type': contentType,
            'content-length': image.byteLength
        });
        res.end(image);
    };

    return {
        matchPath: (requestPath) => requestPath === path,
        methods: READ_METHODS,
        handle,
        meta: {
            path,
            description: `Returns a fixed ${format.toUpperCase()} image.`,
            examples: [path],
            group: httpContentExamples
        }
    };
};

export const imageGif = buildImageEndpoint('gif', 'image.gif', 'image/gif');
export const imagePng = buildImageEndpoint('png', 'image.png', 'image/png');
export const imageJpeg = buildImageEndpoint('jpeg', 'image.jpeg', 'image/jpeg');
