import { expect } from 'chai';
import sinon from 'sinon';
import { describe, it, beforeEach, afterEach } from 'mocha';
import { HubClient, normalizeBaseUrl } from '../src/hub/HubClient';
import { HubError, reasonForStatus } from '../src/hub/hubTypes';
import { EntityCache } from '../src/cache/EntityCache';

function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

/** A fetch that only settles when its signal aborts. */
function hangingFetch(_url: string, init?: RequestInit): Promise<Response> {
    return new Promise((_resolve, reject) => {
        if (init?.signal?.aborted) {
            reject(new Error('The operation was aborted'));
            return;
        }
        init?.signal?.addEventListener('abort', () => reject(new Error('The operation was aborted')));
    });
}

/** Headers arrive at once; the body never does. */
function stalledBodyResponse(): Response {
    return new Response(new ReadableStream<Uint8Array>({ start() {} }), { status: 200 });
}

async function captureError(promise: Promise<unknown>): Promise<HubError> {
    try {
        await promise;
    } catch (error) {
        if (error instanceof HubError) {
            return error;
        }
        throw error;
    }
    throw new Error('expected a HubError');
}

describe('HubClient', () => {
    let fetchFn: sinon.SinonStub<[string, RequestInit?], Promise<Response>>;
    let client: HubClient;

    beforeEach(() => {
        sinon.stub(console, 'debug');
        sinon.stub(console, 'error');
        fetchFn = sinon.stub<[string, RequestInit?], Promise<Response>>();
        client = new HubClient({ baseUrl: 'http://hub.local:8123/', token: 'test-token', requestTimeoutMs: 1000, fetchFn });
    });

    afterEach(() => {
        sinon.restore();
    });

    describe('normalizeBaseUrl', () => {
        it('adds a scheme and strips trailing slashes', () => {
            expect(normalizeBaseUrl('hub.local:8123/')).to.equal('http://hub.local:8123');
        });

        it('maps websocket urls to http and drops the api suffix', () => {
            expect(normalizeBaseUrl('wss://hub.example/api/websocket')).to.equal('https://hub.example');
            expect(normalizeBaseUrl('http://hub.local:8123/api/')).to.equal('http://hub.local:8123');
        });
    });

    it('requires a token', () => {
        expect(() => new HubClient({ baseUrl: 'http://hub.local', token: '', requestTimeoutMs: 1000 }))
            .to.throw('Hub access token is not configured.');
    });

    it('fetches all states with bearer auth', async () => {
        fetchFn.resolves(jsonResponse([{ entity_id: 'light.porch', state: 'on', attributes: { friendly_name: 'Porch' } }]));

        const states = await client.getStates();

        expect(states).to.deep.equal([{ entity_id: 'light.porch', state: 'on', attributes: { friendly_name: 'Porch' } }]);
        const [url, init] = fetchFn.firstCall.args;
        expect(url).to.equal('http://hub.local:8123/api/states');
        expect(init?.method).to.equal('GET');
        expect(init?.headers).to.deep.equal({ 'Authorization': 'Bearer test-token', 'Content-Type': 'application/json' });
        expect(init?.body).to.be.undefined;
    });

    it('defaults missing attributes to an empty object', async () => {
        fetchFn.resolves(jsonResponse({ entity_id: 'sensor.x', state: '1' }));
        const state = await client.getState('sensor.x');
        expect(state.attributes).to.deep.equal({});
        expect(fetchFn.firstCall.args[0]).to.equal('http://hub.local:8123/api/states/sensor.x');
    });

    it('posts service data as JSON', async () => {
        fetchFn.resolves(jsonResponse([{ entity_id: 'lock.front_door', state: 'locked', attributes: {} }]));

        const changed = await client.callService('lock', 'lock', { entity_id: 'lock.front_door' });

        expect(changed.map(s => s.entity_id)).to.deep.equal(['lock.front_door']);
        const [url, init] = fetchFn.firstCall.args;
        expect(url).to.equal('http://hub.local:8123/api/services/lock/lock');
        expect(init?.method).to.equal('POST');
        expect(init?.body).to.equal('{"entity_id":"lock.front_door"}');
    });

    it('builds the history query with start, entity and end', async () => {
        fetchFn.resolves(jsonResponse([[{ entity_id: 'lock.front_door', state: 'locked', attributes: {} }]]));

        const history = await client.getHistory(
            'lock.front_door',
            new Date('2024-05-01T08:00:00.000Z'),
            new Date('2024-05-01T09:00:00.000Z')
        );

        expect(history[0]).to.have.length(1);
        expect(fetchFn.firstCall.args[0]).to.equal(
            'http://hub.local:8123/api/history/period/2024-05-01T08%3A00%3A00.000Z' +
            '?filter_entity_id=lock.front_door&end_time=2024-05-01T09%3A00%3A00.000Z'
        );
    });

    it('maps HTTP statuses to error reasons', () => {
        expect(reasonForStatus(401)).to.equal('Unauthorized');
        expect(reasonForStatus(403)).to.equal('Unauthorized');
        expect(reasonForStatus(400)).to.equal('BadRequest');
        expect(reasonForStatus(404)).to.equal('BadRequest');
        expect(reasonForStatus(502)).to.equal('ServerError');
    });

    it('raises Unauthorized with the status and body', async () => {
        fetchFn.resolves(new Response('401: Unauthorized', { status: 401 }));

        const error = await captureError(client.getStates());

        expect(error.reason).to.equal('Unauthorized');
        expect(error.status).to.equal(401);
        expect(error.message).to.equal('Hub responded 401 to GET /api/states: 401: Unauthorized');
    });

    it('raises BadRequest for an unknown service', async () => {
        fetchFn.resolves(new Response('', { status: 400 }));
        const error = await captureError(client.callService('light', 'explode', {}));
        expect(error.reason).to.equal('BadRequest');
        expect(error.message).to.equal('Hub responded 400 to POST /api/services/light/explode');
    });

    it('raises Unreachable when the connection fails', async () => {
        fetchFn.rejects(new TypeError('fetch failed'));
        const error = await captureError(client.getStates());
        expect(error.reason).to.equal('Unreachable');
        expect(error.message).to.equal('Cannot reach hub at http://hub.local:8123: fetch failed');
    });

    it('raises ServerError for a response of the wrong shape', async () => {
        fetchFn.resolves(jsonResponse({ message: 'not a list' }));
        const error = await captureError(client.getStates());
        expect(error.reason).to.equal('ServerError');
        expect(error.status).to.equal(200);
    });

    it('raises ServerError for a body that is not JSON', async () => {
        fetchFn.resolves(new Response('<html>', { status: 200 }));
        const error = await captureError(client.getStates());
        expect(error.reason).to.equal('ServerError');
    });

    it('times out a request that takes too long', async () => {
        const slow = new HubClient({ baseUrl: 'http://hub.local', token: 'test-token', requestTimeoutMs: 20, fetchFn: hangingFetch });
        const error = await captureError(slow.getStates());
        expect(error.reason).to.equal('Timeout');
        expect(error.message).to.equal('Hub request timed out after 20 ms: GET /api/states');
    });

    it('cancels the request when the run is aborted', async () => {
        const slow = new HubClient({ baseUrl: 'http://hub.local', token: 'test-token', requestTimeoutMs: 10_000, fetchFn: hangingFetch });
        const controller = new AbortController();
        const pending = captureError(slow.getStates(controller.signal));
        controller.abort();

        const error = await pending;

        expect(error.reason).to.equal('Timeout');
        expect(error.message).to.equal('Hub request cancelled: GET /api/states');
    });

    it('does not start a request for an already aborted run', async () => {
        const controller = new AbortController();
        controller.abort();
        fetchFn.callsFake(hangingFetch);

        const error = await captureError(client.getStates(controller.signal));

        expect(error.message).to.equal('Hub request cancelled: GET /api/states');
    });

    it('times out a response whose body stalls', async () => {
        const slow = new HubClient({ baseUrl: 'http://hub.local', token: 'test-token', requestTimeoutMs: 20, fetchFn: async () => stalledBodyResponse() });

        const error = await captureError(slow.getStates());

        expect(error.reason).to.equal('Timeout');
        expect(error.message).to.equal('Hub request timed out after 20 ms: GET /api/states');
    });

    it('cancels a body read when the run is aborted', async () => {
        fetchFn.callsFake(async () => stalledBodyResponse());
        const controller = new AbortController();
        const pending = captureError(client.getStates(controller.signal));
        await new Promise(resolve => setTimeout(resolve, 5));
        controller.abort();

        const error = await pending;

        expect(error.message).to.equal('Hub request cancelled: GET /api/states');
    });

    it('lets the entity cache start a fresh refresh after a stalled body', async () => {
        sinon.stub(console, 'log');
        sinon.stub(console, 'warn');
        fetchFn.onFirstCall().callsFake(async () => stalledBodyResponse());
        fetchFn.onSecondCall().resolves(jsonResponse([{ entity_id: 'light.porch', state: 'on' }]));
        const slow = new HubClient({ baseUrl: 'http://hub.local', token: 'test-token', requestTimeoutMs: 20, fetchFn });
        const cache = new EntityCache(slow, { refreshIntervalMs: 60000 });

        const first = await cache.refresh();
        const second = await cache.refresh();

        expect(first.ok).to.be.false;
        expect(first.ok === false && first.error.reason).to.equal('Timeout');
        expect(second.ok).to.be.true;
        expect(fetchFn.callCount).to.equal(2);
        expect(cache.get('light.porch')?.state).to.equal('on');
    });

    it('groups service names by domain', async () => {
        fetchFn.resolves(jsonResponse([
            { domain: 'light', services: { turn_on: {}, toggle: {}, turn_off: {} } },
            { domain: 'scene', services: {} },
        ]));

        const services = await client.getServices();

        expect(fetchFn.firstCall.args[0]).to.equal('http://hub.local:8123/api/services');
        expect(services).to.deep.equal({ light: ['toggle', 'turn_off', 'turn_on'], scene: [] });
    });

    it('checks the connection without throwing', async () => {
        fetchFn.onFirstCall().resolves(jsonResponse({ message: 'API running.' }));
        fetchFn.onSecondCall().rejects(new TypeError('fetch failed'));

        expect(await client.checkConnection()).to.be.true;
        expect(fetchFn.firstCall.args[0]).to.equal('http://hub.local:8123/api/');
        expect(await client.checkConnection()).to.be.false;
    });
});
