import { expect } from 'chai';
import type { DestroyableServer } from 'destroyable-server';

import { httpGetRaw, startServer } from './test-helpers.js';

describe("Status endpoint", () => {

    let server: DestroyableServer;
    let serverPort: number;

    beforeEach(async () => {
        ({ server, port: serverPort } = await startServer());
    });

    afterEach(async () => {
        await server.destroy();
    });

    it("returns a 200", async () => {
        const address = `http://localhost:${serverPort}/status/200`;
        const response = await fetch(address);
        expect(response.status).to.equal(200);
        expect(await response.text()).to.equal('');
    });

    it("returns a 500", async () => {
        const address = `http://localhost:${serverPort}/status/500`;
        const response = await fetch(address);
        expect(response.status).to.equal(500);
    });

    it("returns unregistered codes", async () => {
        const { response, body } = await httpGetRaw(`http://localhost:${serverPort}/status/777`);
        expect(response.statusCode).to.equal(777);
        expect(body.byteLength).to.equal(0);
    });

    it("accepts any method", async () => {
        for (const method of ['POST', 'PUT', 'DELETE', 'PATCH']) {
            const address = `http://localhost:${serverPort}/status/201`;
            const response = await fetch(address, { method });
            expect(response.status).to.equal(201);
        }
    });

    it("sends 1xx codes as interim responses before an empty 200", async () => {
        for (const code of [100, 102, 103, 150]) {
            const { response, body, informational } = await httpGetRaw(
                `http://localhost:${serverPort}/status/${code}`
            );
            expect(informational).to.deep.equal([code]);
            expect(response.statusCode).to.equal(200);
            expect(body.byteLength).to.equal(0);
        }
    });

    it("rejects 101, which needs an upgrade request", async () => {
        const response = await fetch(`http://localhost:${serverPort}/status/101`);
        expect(response.status).to.equal(400);
        expect(await response.json()).to.deep.equal({
            error: { message: 'Invalid status code 101' }
        });
    });

    it("redirects for 3xx codes", async () => {
        for (const code of [301, 302, 303, 305, 307]) {
            const address = `http://localhost:${serverPort}/status/${code}`;
            const response = await fetch(address, { redirect: 'manual' });
            expect(response.status).to.equal(code);
            expect(response.headers.get('location')).to.equal('/redirect/1');
        }
    });

    it("does not redirect for other 3xx codes", async () => {
        const address = `http://localhost:${serverPort}/status/308`;
        const response = await fetch(address, { redirect: 'manual' });
        expect(response.status).to.equal(308);
        expect(response.headers.get('location')).to.equal(null);
    });

    it("challenges for auth with a 401", async () => {
        const address = `http://localhost:${serverPort}/status/401`;
        const response = await fetch(address);
        expect(response.status).to.equal(401);
        expect(response.headers.get('www-authenticate')).to.equal('Basic realm="Fake Realm"');
    });

    it("returns a fixed body with a 402", async () => {
        const address = `http://localhost:${serverPort}/status/402`;
        const response = await fetch(address);
        expect(response.status).to.equal(402);
        expect(response.headers.get('x-more-info')).to.equal('http://vimeo.com/22053820');
        expect(await response.text()).to.equal('Fuck you, pay me!');
    });

    it("returns the accepted media types with a 406", async () => {
        const address = `http://localhost:${serverPort}/status/406`;
        const response = await fetch(address);
        expect(response.status).to.equal(406);
        expect(response.headers.get('content-type')).to.equal('application/json');
        expect(await response.text()).to.equal(
            '{"message": "Client did not request a supported media type.", ' +
            '"accept": ["image/webp", "image/svg+xml", "image/jpeg", "image/png", "image/*"]}'
        );
    });

    it("returns a teapot with a 418", async () => {
        const address = `http://localhost:${serverPort}/status/418`;
        const response = await fetch(address);
        expect(response.status).to.equal(418);
        expect(response.headers.get('x-more-info')).to.equal('http://tools.ietf.org/html/rfc2324');
        expect(await response.text()).to.include('-=[ teapot ]=-');
    });

    it("fails given a code that can't be sent", async () => {
        for (const code of ['99', '1000']) {
            const address = `http://localhost:${serverPort}/status/${code}`;
            const response = await fetch(address);
            expect(response.status).to.equal(400);
            expect(await response.json()).to.deep.equal({
                error: { message: `Invalid status code ${code}` }
            });
        }
    });

    it("does not match a non-numeric code", async () => {
        const address = `http://localhost:${serverPort}/status/wow`;
        const response = await fetch(address);
        expect(response.status).to.equal(404);
    });

});
