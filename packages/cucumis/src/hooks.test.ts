import { afterEach, describe, expect, it, vi } from 'vitest';
import { Before, BeforeAll, HookRegistry, globalHookRegistry, isPlainObject } from './hooks.js';
import { TimeoutError } from './timeout.js';

describe('HookRegistry', () => {
	it('should order hooks by priority, lowest first', async () => {
		const hooks = new HookRegistry();
		const calls: string[] = [];
		hooks.register('beforeScenario', () => void calls.push('late'), undefined, { priority: 2000 });
		hooks.register('beforeScenario', () => void calls.push('default'));
		hooks.register('beforeScenario', () => void calls.push('early'), undefined, { priority: 10 });

		await hooks.runHooks('beforeScenario', { state: {} });

		expect(calls).toEqual(['early', 'default', 'late']);
	});

	it('should only return hooks of the requested scope', () => {
		const hooks = new HookRegistry();
		hooks.register('beforeStep', () => {});
		hooks.register('afterStep', () => {});

		expect(hooks.getHooks('beforeStep').map((h) => h.scope)).toEqual(['beforeStep']);
	});

	it('should filter tag-scoped hooks by the scenario tags', () => {
		const hooks = new HookRegistry();
		hooks.register('beforeScenario', '@db', () => {});
		hooks.register('beforeScenario', '@db and not @readonly', () => {});

		expect(hooks.getHooks('beforeScenario', ['db'])).toHaveLength(2);
		expect(hooks.getHooks('beforeScenario', ['db', 'readonly'])).toHaveLength(1);
		expect(hooks.getHooks('beforeScenario', ['ui'])).toHaveLength(0);
		expect(hooks.getHooks('beforeScenario')).toHaveLength(0);
	});

	it('should run a negated tag filter on an untagged scenario', async () => {
		const hooks = new HookRegistry();
		const fn = vi.fn();
		hooks.register('beforeScenario', 'not @wip', fn);

		expect(hooks.getHooks('beforeScenario', [])).toHaveLength(1);
		expect(hooks.getHooks('beforeScenario', ['wip'])).toHaveLength(0);

		await hooks.runHooks('beforeScenario', { state: {} });
		expect(fn).toHaveBeenCalledTimes(1);
	});

	it('should require a function after a tag filter', () => {
		const hooks = new HookRegistry();

		expect(() => hooks.register('afterScenario', '@db')).toThrow(
			'Hook registered with tag filter "@db" but no function provided',
		);
	});

	it('should merge returned objects into the state and return them', async () => {
		const hooks = new HookRegistry();
		hooks.register('beforeScenario', () => ({ basket: 'empty' }));
		hooks.register('beforeScenario', ({ state }) => ({ seen: state.basket }));
		const state = { existing: true };

		const additions = await hooks.runHooks('beforeScenario', { state });

		expect(additions).toEqual({ basket: 'empty', seen: 'empty' });
		expect(state).toEqual({ existing: true, basket: 'empty', seen: 'empty' });
	});

	it('should stop at the first hook that throws', async () => {
		const hooks = new HookRegistry();
		const after = vi.fn();
		hooks.register('afterAll', () => {
			throw new Error('cleanup failed');
		});
		hooks.register('afterAll', after);

		await expect(hooks.runHooks('afterAll', { state: {} })).rejects.toThrow('cleanup failed');
		expect(after).not.toHaveBeenCalled();
	});

	it('should time out a hook that never settles', async () => {
		const hooks = new HookRegistry();
		hooks.register('beforeAll', () => new Promise<void>(() => {}), undefined, { name: 'slow', timeout: 5 });

		const run = hooks.runHooks('beforeAll', { state: {} });

		await expect(run).rejects.toBeInstanceOf(TimeoutError);
		await expect(run).rejects.toThrow('slow timed out after 5ms');
	});

	it('should empty on clear', () => {
		const hooks = new HookRegistry();
		hooks.register('beforeAll', () => {});
		hooks.clear();

		expect(hooks.getAll()).toEqual([]);
	});
});

describe('global hook helpers', () => {
	afterEach(() => {
		globalHookRegistry.clear();
	});

	it('should register into the global registry with the right scope', () => {
		Before('@admin', () => ({ role: 'admin' }));
		BeforeAll(() => {});

		expect(globalHookRegistry.getAll().map((h) => [h.scope, h.tagFilter])).toEqual([
			['beforeScenario', '@admin'],
			['beforeAll', null],
		]);
	});
});

describe('isPlainObject', () => {
	it.each([
		[{}, true],
		[Object.create(null), true],
		[[], false],
		[new Date(0), false],
		[null, false],
		['text', false],
	])('should classify %o as %s', (value, expected) => {
		expect(isPlainObject(value)).toBe(expected);
	});
});
