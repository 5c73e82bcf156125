import { expect } from 'chai';
import type { DestroyableServer } from 'destroyable-server';

import { httpGetRaw, startServer } from './test-helpers.js';

describe("Request inspection endpoints", () => {

    let server: DestroyableServer;
    let serverPort: number;

    beforeEach(async () => {
        ({ server, port: serverPort } = await startServer());
    });

    afterEach(async () => {
        await server.destroy();
    });

    it("returns the client address at /ip", async () => {
        const response = await fetch(`http://127.0.0.1:${serverPort}/ip`);

        expect(response.status).to.equal(200);
        expect(response.headers.get('content-type')).to.equal('application/json');
        expect(await response.json()).to.deep.equal({ origin: '127.0.0.1' });
    });

    it("returns the user agent at /user-agent", async () => {
        const response = await fetch(`http://localhost:${serverPort}/user-agent`, {
            headers: { 'User-Agent': 'test-client/1.0' }
        });

        expect(response.status).to.equal(200);
        expect(await response.json()).to.deep.equal({ 'user-agent': 'test-client/1.0' });
    });

    it("returns an empty user agent at /user-agent if none is sent", async () => {
        const { response, body } = await httpGetRaw(`http://localhost:${serverPort}/user-agent`);

        expect(response.statusCode).to.equal(200);
        expect(body.toString()).to.equal('{\n  "user-agent": ""\n}\n');
    });

    it("returns canonicalized headers at /headers", async () => {
        const response = await fetch(`http://localhost:${serverPort}/headers`, {
            headers: { 'x-custom-header': 'hello' }
        });

        expect(response.status).to.equal(200);
        expect(await response.json()).to.have.property('headers').that.deep.includes({
            'Host': `localhost:${serverPort}`,
            'X-Custom-Header': 'hello'
        });
    });

    it("returns only the first value of repeated headers", async () => {
        const { body } = await httpGetRaw(`http://localhost:${serverPort}/headers`, {
            'x-repeated': ['first', 'second']
        });

        expect(JSON.parse(body.toString())).to.have.nested.property('headers.X-Repeated', 'first');
    });

    it("returns headers in sorted order", async () => {
        const { body } = await httpGetRaw(`http://localhost:${serverPort}/headers`, {
            'x-zebra': 'z',
            'x-aardvark': 'a'
        });
        const text = body.toString();

        expect(text.indexOf('"X-Aardvark"')).to.be.greaterThan(-1);
        expect(text.indexOf('"X-Aardvark"')).to.be.lessThan(text.indexOf('"X-Zebra"'));
    });

});
