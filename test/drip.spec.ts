import * as http from 'http';
import { expect } from 'chai';
import type { DestroyableServer } from 'destroyable-server';
import { delay } from '@httptoolkit/util';

import {
    disconnectAfterFirstChunk,
    httpGetRaw,
    startServer,
    watchNextResponse
} from './test-helpers.js';

describe("Drip endpoint", function () {

    this.timeout(5000);

    let server: DestroyableServer;
    let serverPort: number;

    beforeEach(async () => {
        ({ server, port: serverPort } = await startServer());
    });

    afterEach(async () => {
        await server.destroy();
    });

    it("sends the requested bytes over the duration", async () => {
        const start = Date.now();
        const response = await fetch(`http://localhost:${serverPort}/drip?numbytes=5&duration=0.25`);

        expect(response.status).to.equal(200);
        expect(response.headers.get('content-type')).to.equal('application/octet-stream');
        expect(response.headers.get('content-length')).to.equal('5');
        expect(await response.text()).to.equal('*****');
        expect(Date.now() - start).to.be.at.least(240);
    });

    it("uses the given status code", async () => {
        const response = await fetch(`http://localhost:${serverPort}/drip?numbytes=10&duration=0.1&code=500`);

        expect(response.status).to.equal(500);
        expect(await response.text()).to.equal('**********');
    });

    it("sends a 1xx code as an interim response before the bytes", async () => {
        const { response, body, informational } = await httpGetRaw(
            `http://localhost:${serverPort}/drip?numbytes=3&duration=0&code=102`
        );

        expect(informational).to.deep.equal([102]);
        expect(response.statusCode).to.equal(200);
        expect(body.toString()).to.equal('***');
    });

    it("waits for the initial delay before responding", async () => {
        const start = Date.now();
        const response = await fetch(`http://localhost:${serverPort}/drip?numbytes=1&duration=0&delay=0.2`);

        expect(response.status).to.equal(200);
        expect(await response.text()).to.equal('*');
        expect(Date.now() - start).to.be.at.least(190);
    });

    it("returns an empty body immediately for zero bytes", async () => {
        const start = Date.now();
        const response = await fetch(`http://localhost:${serverPort}/drip?numbytes=0&duration=10`);

        expect(response.status).to.equal(200);
        expect(await response.text()).to.equal('');
        expect(Date.now() - start).to.be.lessThan(1000);
    });

    it("fails for an invalid code", async () => {
        for (const code of ['abc', '1000', '99', '101']) {
            const response = await fetch(`http://localhost:${serverPort}/drip?numbytes=1&duration=0&code=${code}`);

            expect(response.status).to.equal(500);
            expect(await response.json()).to.deep.equal({
                error: { message: "failed to parse 'code'" }
            });
        }
    });

    it("fails for an invalid delay", async () => {
        const response = await fetch(`http://localhost:${serverPort}/drip?numbytes=1&duration=0&delay=soon`);

        expect(response.status).to.equal(500);
        expect(await response.json()).to.deep.equal({
            error: { message: "failed to parse 'delay'" }
        });
    });

    it("keeps pacing durations too long for a single timer", async () => {
        // 3,000,000 seconds between bytes is far beyond the largest setTimeout delay
        const req = http.get(`http://localhost:${serverPort}/drip?numbytes=2&duration=6000000`);
        const response = await new Promise<http.IncomingMessage>((resolve, reject) => {
            req.on('response', resolve);
            req.on('error', reject);
        });
        response.on('error', () => {}); // Expected, since the body is cut off

        let body = '';
        let ended = false;
        response.on('data', (data: Buffer) => { body += data.toString(); });
        response.on('end', () => { ended = true; });

        await delay(300);

        expect(body).to.equal('*');
        expect(ended).to.equal(false);
        req.destroy();
    });

    it("stops writing once the client disconnects", async () => {
        const response = watchNextResponse(server);
        await disconnectAfterFirstChunk(`http://localhost:${serverPort}/drip?numbytes=100&duration=5`);
        await response.closed;

        const writesAtClose = response.getWriteCount();
        expect(writesAtClose).to.be.at.least(1);
        expect(writesAtClose).to.be.lessThan(100);

        await delay(300);
        expect(response.getWriteCount()).to.equal(writesAtClose);
    });

    it("does not match without numeric numbytes and duration", async () => {
        for (const query of ['numbytes=5', 'duration=1', 'numbytes=x&duration=1']) {
            const response = await fetch(`http://localhost:${serverPort}/drip?${query}`);
            expect(response.status).to.equal(404);
        }
    });

});
