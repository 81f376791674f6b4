import { expect } from 'chai';
import sinon from 'sinon';
import { describe, it, beforeEach, afterEach } from 'mocha';
import { EntityCache } from '../src/cache/EntityCache';
import { HubError, HubState } from '../src/hub/hubTypes';
import { fakeHub, hubState, sampleStates } from './helpers/fakes';

const HOUR = 60 * 60 * 1000;

describe('EntityCache', () => {
    let clock: Date;
    const now = () => clock;

    beforeEach(() => {
        clock = new Date('2024-05-01T10:00:00.000Z');
        sinon.stub(console, 'log');
        sinon.stub(console, 'debug');
        sinon.stub(console, 'warn');
    });

    afterEach(() => {
        sinon.restore();
    });

    it('starts empty and stale', () => {
        const cache = new EntityCache(fakeHub(), { refreshIntervalMs: HOUR, now });
        expect(cache.getAll().entities.size).to.equal(0);
        expect(cache.getAll().lastRefresh).to.be.null;
        expect(cache.isStale()).to.be.true;
        expect(cache.entitySummary()).to.equal('No entities cached.');
    });

    it('builds entities from hub states on refresh', async () => {
        const cache = new EntityCache(fakeHub(), { refreshIntervalMs: HOUR, now });
        const result = await cache.refresh();

        expect(result.ok).to.be.true;
        const door = cache.get('lock.front_door');
        expect(door).to.include({ id: 'lock.front_door', name: 'Front Door', domain: 'lock', state: 'locked' });
        expect(door?.observedAt.toISOString()).to.equal('2024-05-01T10:00:00.000Z');
        expect(cache.getAll().lastRefresh?.toISOString()).to.equal('2024-05-01T10:00:00.000Z');
        expect(cache.isStale()).to.be.false;
    });

    it('falls back to the entity id when there is no friendly name', async () => {
        const cache = new EntityCache(fakeHub([hubState('switch.pump', 'off')]), { refreshIntervalMs: HOUR, now });
        await cache.refresh();
        expect(cache.get('switch.pump')?.name).to.equal('switch.pump');
    });

    it('drops entities absent from the next refresh', async () => {
        const hub = fakeHub();
        const cache = new EntityCache(hub, { refreshIntervalMs: HOUR, now });
        await cache.refresh();
        hub.getStates.resolves([hubState('lock.front_door', 'unlocked', 'Front Door')]);

        await cache.refresh();

        expect([...cache.getAll().entities.keys()]).to.deep.equal(['lock.front_door']);
        expect(cache.get('lock.front_door')?.state).to.equal('unlocked');
    });

    it('keeps the old snapshot object intact for readers holding it', async () => {
        const hub = fakeHub();
        const cache = new EntityCache(hub, { refreshIntervalMs: HOUR, now });
        await cache.refresh();
        const before = cache.getAll();
        hub.getStates.resolves([]);

        await cache.refresh();

        expect(before.entities.size).to.equal(sampleStates().length);
        expect(cache.getAll().entities.size).to.equal(0);
        expect(Object.isFrozen(before)).to.be.true;
    });

    it('shares one hub fetch between concurrent refreshes', async () => {
        const hub = fakeHub();
        let release: (states: HubState[]) => void = () => undefined;
        hub.getStates.returns(new Promise<HubState[]>(resolve => { release = resolve; }));
        const cache = new EntityCache(hub, { refreshIntervalMs: HOUR, now });

        const first = cache.refresh();
        const second = cache.refresh();
        release(sampleStates());
        const [a, b] = await Promise.all([first, second]);

        expect(hub.getStates.callCount).to.equal(1);
        expect(a).to.equal(b);
    });

    it('keeps serving the previous snapshot when a refresh fails', async () => {
        const hub = fakeHub();
        const cache = new EntityCache(hub, { refreshIntervalMs: HOUR, now });
        await cache.refresh();
        hub.getStates.rejects(new HubError('Unreachable', 'Cannot reach hub at http://hub.local'));

        const result = await cache.refresh();

        expect(result.ok).to.be.false;
        if (!result.ok) {
            expect(result.error.reason).to.equal('Unreachable');
        }
        expect(cache.get('lock.front_door')?.state).to.equal('locked');
    });

    it('wraps non-hub failures as Unreachable', async () => {
        const hub = fakeHub();
        hub.getStates.rejects(new Error('socket hang up'));
        const cache = new EntityCache(hub, { refreshIntervalMs: HOUR, now });

        const result = await cache.refresh();

        expect(result.ok).to.be.false;
        if (!result.ok) {
            expect(result.error).to.be.instanceOf(HubError);
            expect(result.error.reason).to.equal('Unreachable');
            expect(result.error.message).to.equal('socket hang up');
        }
    });

    describe('refreshIfStale', () => {
        it('does not call the hub while the snapshot is fresh', async () => {
            const hub = fakeHub();
            const cache = new EntityCache(hub, { refreshIntervalMs: HOUR, now });
            await cache.refresh();
            clock = new Date('2024-05-01T10:59:59.000Z');

            expect(await cache.refreshIfStale()).to.be.undefined;
            expect(hub.getStates.callCount).to.equal(1);
        });

        it('refreshes once the interval has elapsed', async () => {
            const hub = fakeHub();
            const cache = new EntityCache(hub, { refreshIntervalMs: HOUR, now });
            await cache.refresh();
            clock = new Date('2024-05-01T11:00:00.000Z');

            expect(await cache.refreshIfStale()).to.be.undefined;
            expect(hub.getStates.callCount).to.equal(2);
        });

        it('returns a warning instead of failing when the hub is down', async () => {
            const hub = fakeHub();
            const cache = new EntityCache(hub, { refreshIntervalMs: HOUR, now });
            await cache.refresh();
            clock = new Date('2024-05-01T12:00:00.000Z');
            hub.getStates.rejects(new HubError('Unreachable', 'Cannot reach hub'));

            const warning = await cache.refreshIfStale();

            expect(warning).to.equal(
                'Entity list could not be refreshed (Cannot reach hub); using cached data from 2024-05-01T10:00:00.000Z.'
            );
            expect(cache.get('lock.back_door')?.state).to.equal('unlocked');
            expect(cache.isStale()).to.be.true;
        });

        it('says the cache is empty when it never loaded', async () => {
            const hub = fakeHub();
            hub.getStates.rejects(new HubError('Unauthorized', 'Hub responded 401'));
            const cache = new EntityCache(hub, { refreshIntervalMs: HOUR, now });

            expect(await cache.refreshIfStale()).to.equal(
                'Entity list could not be refreshed (Hub responded 401); no cached data is available.'
            );
        });
    });

    it('lists one domain sorted by id', async () => {
        const cache = new EntityCache(fakeHub(), { refreshIntervalMs: HOUR, now });
        await cache.refresh();
        expect(cache.listDomain('lock').map(e => e.id)).to.deep.equal(['lock.back_door', 'lock.front_door']);
        expect(cache.listDomain('fan')).to.deep.equal([]);
    });

    it('summarises entity counts per domain', async () => {
        const cache = new EntityCache(fakeHub(), { refreshIntervalMs: HOUR, now });
        await cache.refresh();
        expect(cache.entitySummary()).to.equal('Cached entities: 1 automation, 1 climate, 2 light, 2 lock, 1 sensor');
    });

    it('refreshes on a timer between start and stop', async () => {
        const timers = sinon.useFakeTimers({ toFake: ['setInterval', 'clearInterval'] });
        const hub = fakeHub();
        const cache = new EntityCache(hub, { refreshIntervalMs: HOUR, now });

        cache.start();
        await timers.tickAsync(HOUR);
        await timers.tickAsync(HOUR);
        cache.stop();
        await timers.tickAsync(HOUR);

        expect(hub.getStates.callCount).to.equal(2);
    });
});
