import { describe, it, expect } from 'vitest';
import { parseClientMessage, parseSpotQuery } from '../server';

describe('parseClientMessage', () => {
    it('accepts the known message types', () => {
        expect(parseClientMessage('{"type":"COMMAND","command":"sh/dx"}')).toEqual({ type: 'COMMAND', command: 'sh/dx' });
        expect(parseClientMessage('{"type":"SET_FILTER","filter":{"bands":["20m"],"neededOnly":true}}')).toEqual({
            type: 'SET_FILTER',
            filter: { bands: ['20m'], neededOnly: true },
        });
        expect(parseClientMessage('{"type":"RELOAD_AWARDS"}')).toEqual({ type: 'RELOAD_AWARDS' });
        expect(parseClientMessage('{"type":"CONNECT"}')).toEqual({ type: 'CONNECT' });
        expect(parseClientMessage('{"type":"DISCONNECT"}')).toEqual({ type: 'DISCONNECT' });
    });

    it('returns null for anything else', () => {
        expect(parseClientMessage('not json')).toBeNull();
        expect(parseClientMessage('{"type":"SHUTDOWN"}')).toBeNull();
        expect(parseClientMessage('{"type":"COMMAND"}')).toBeNull();
        expect(parseClientMessage('{"type":"SET_FILTER","filter":{"bands":"20m"}}')).toBeNull();
    });
});

describe('parseSpotQuery', () => {
    it('maps query parameters to a view and filter', () => {
        expect(parseSpotQuery({ band: '20m, 15m,', grid: ' FN ', prefix: 'K', view: 'needed' })).toEqual({
            view: 'needed',
            filter: { bands: ['20m', '15m'], grid: 'FN', entityPrefix: 'K' },
        });
    });

    it('defaults to every spot without a filter', () => {
        expect(parseSpotQuery({})).toEqual({ view: 'all', filter: {} });
        expect(parseSpotQuery({ view: 'regular', band: ['40m', '30m'] })).toEqual({ view: 'all', filter: { bands: ['40m'] } });
    });
});
