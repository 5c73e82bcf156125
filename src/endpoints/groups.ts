export interface EndpointGroup {
    id: string;
    name: string;
    description?: string;
}

export interface EndpointMeta {
    path: string;
    description: string;
    examples?: string[];
    group?: EndpointGroup;
}

export const httpRequestInspection: EndpointGroup = {
    id: 'request-inspection',
    name: 'Request Inspection'
};

export const httpRedirects: EndpointGroup = {
    id: 'redirects',
    name: 'Redirects',
    description: 'Relative redirect chains always end at /get, after exactly max(n, 1) hops.'
};

export const httpStatusCodes: EndpointGroup = {
    id: 'status-codes',
    name: 'Status Codes'
};

export const httpDynamicData: EndpointGroup = {
    id: 'dynamic-data',
    name: 'Dynamic Data',
    description: 'Generated and paced responses, useful for testing streaming, timeouts and large downloads.'
};

export const httpCookies: EndpointGroup = {
    id: 'cookies',
    name: 'Cookies'
};

export const httpCaching: EndpointGroup = {
    id: 'caching',
    name: 'Caching'
};

export const httpContentEncoding: EndpointGroup = {
    id: 'content-encoding',
    name: 'Response Content Encodings'
};

export const httpContentExamples: EndpointGroup = {
    id: 'content-examples',
    name: 'Response Content Formats'
};

export const httpAuthentication: EndpointGroup = {
    id: 'authentication',
    name: 'Authentication'
};
