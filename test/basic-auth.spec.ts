import { expect } from 'chai';
import type { DestroyableServer } from 'destroyable-server';

import { basicAuthHeader, startServer } from './test-helpers.js';

describe("Basic-auth endpoints", () => {

    let server: DestroyableServer;
    let serverPort: number;

    beforeEach(async () => {
        ({ server, port: serverPort } = await startServer());
    });

    afterEach(async () => {
        await server.destroy();
    });

    describe("/basic-auth", () => {

        it("requests auth if none is provided", async () => {
            const address = `http://localhost:${serverPort}/basic-auth/user/pwd`;
            const response = await fetch(address);
            expect(response.status).to.equal(401);
            expect(response.headers.get('www-authenticate')).to.equal('Basic realm="Fake Realm"');
        });

        it("rejects incorrect auth", async () => {
            const address = `http://localhost:${serverPort}/basic-auth/user/pwd`;
            const response = await fetch(address, {
                headers: {
                    'Authorization': basicAuthHeader('wrong', 'credentials')
                }
            });

            expect(response.status).to.equal(401);
        });

        it("rejects a correct username with the wrong password", async () => {
            const address = `http://localhost:${serverPort}/basic-auth/user/pwd`;
            const response = await fetch(address, {
                headers: {
                    'Authorization': basicAuthHeader('user', 'pwd2')
                }
            });

            expect(response.status).to.equal(401);
        });

        it("accepts correct auth", async () => {
            const address = `http://localhost:${serverPort}/basic-auth/user/pwd`;
            const response = await fetch(address, {
                headers: {
                    'Authorization': basicAuthHeader('user', 'pwd')
                }
            });

            expect(response.status).to.equal(200);
            expect(await response.json()).to.deep.equal({
                "authenticated": true,
                "user": "user"
            });
        });

        it("accepts passwords containing colons and encoded path characters", async () => {
            const address = `http://localhost:${serverPort}/basic-auth/test%20user/test:secret`;
            const response = await fetch(address, {
                headers: {
                    'Authorization': basicAuthHeader('test user', 'test:secret')
                }
            });

            expect(response.status).to.equal(200);
            expect(await response.json()).to.deep.equal({
                "authenticated": true,
                "user": "test user"
            });
        });

        it("accepts a lowercase auth scheme", async () => {
            const address = `http://localhost:${serverPort}/basic-auth/user/pwd`;
            const response = await fetch(address, {
                headers: {
                    'Authorization': basicAuthHeader('user', 'pwd').replace('Basic', 'basic')
                }
            });

            expect(response.status).to.equal(200);
        });

    });

    describe("/hidden-basic-auth", () => {

        it("returns a 404 with no challenge if no auth is provided", async () => {
            const address = `http://localhost:${serverPort}/hidden-basic-auth/user/pwd`;
            const response = await fetch(address);
            expect(response.status).to.equal(404);
            expect(response.headers.get('www-authenticate')).to.equal(null);
        });

        it("returns a 404 for incorrect auth", async () => {
            const address = `http://localhost:${serverPort}/hidden-basic-auth/user/pwd`;
            const response = await fetch(address, {
                headers: {
                    'Authorization': basicAuthHeader('user', 'wrong')
                }
            });

            expect(response.status).to.equal(404);
        });

        it("accepts correct auth", async () => {
            const address = `http://localhost:${serverPort}/hidden-basic-auth/user/pwd`;
            const response = await fetch(address, {
                headers: {
                    'Authorization': basicAuthHeader('user', 'pwd')
                }
            });

            expect(response.status).to.equal(200);
            expect(await response.json()).to.deep.equal({
                "authenticated": true,
                "user": "user"
            });
        });

    });

});
