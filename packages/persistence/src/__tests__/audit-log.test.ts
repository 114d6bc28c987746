import { describe, it, expect } from 'vitest';
import { createAggregateRegistry, toSnapshot } from '../aggregate-registry.js';
import { getOperationName } from '../audit-log.js';
import { widget, widgetHandler } from './fixtures.js';

class RemoveWidget {
	constructor(readonly widgetId: string) {}
}

describe('getOperationName', () => {
	it('should prefer the command type tag', () => {
		expect(getOperationName({ _type: 'AddUserGrant' })).toBe('AddUserGrant');
	});

	it('should fall back to the class name', () => {
		expect(getOperationName(new RemoveWidget('w1'))).toBe('RemoveWidget');
	});

	it('should return Unknown for plain objects and non-objects', () => {
		expect(getOperationName({ widgetId: 'w1' })).toBe('Unknown');
		expect(getOperationName(null)).toBe('Unknown');
		expect(getOperationName('x')).toBe('Unknown');
		expect(getOperationName(Object.create(null))).toBe('Unknown');
	});
});

describe('AggregateRegistry', () => {
	it('should resolve registered handlers and reject duplicates', () => {
		const registry = createAggregateRegistry();
		registry.register(widgetHandler);

		expect(registry.get('widget')).toBe(widgetHandler);
		expect(registry.get('gadget')).toBeNull();
		expect(registry.typeNames()).toEqual(['widget']);
		expect(() => registry.register(widgetHandler)).toThrow('Aggregate handler already registered: widget');
	});

	it('should snapshot dates as ISO strings', () => {
		expect(toSnapshot(widget('w1', 1, 'alpha'))).toEqual({
			id: 'w1',
			sequence: 1,
			resourceOwner: 'org-1',
			changeDate: '2031-01-01T00:00:00.000Z',
			name: 'alpha',
		});
	});
});
