import { HookDeniedError, TidemarkError } from '../errors.js'
import { createModuleLogger } from '../logger.js'
import type { HookConfig } from '../types.js'
import type {
	HookDispose,
	HookEvent,
	HookEventContextMap,
	HookHandler,
} from './types.js'

type ErasedHookFn = (ctx: never) => void

const log = createModuleLogger('hooks')

const HOOK_CONFIG_MAP: Record<keyof HookConfig, HookEvent> = {
	onBeforeAppend: 'beforeAppend',
	onAppend: 'afterAppend',
	onBeforeAdvance: 'beforeAdvance',
	onAdvance: 'afterAdvance',
	onRefresh: 'afterRefresh',
	onCompact: 'afterCompact',
}

/**
 * Ordered lists of synchronous hooks per event. Before-hooks gate an
 * operation: anything they throw aborts it. After-hooks observe committed
 * work, so their failures are logged and never undo the operation.
 */
export class HookRegistry {
	private hooks = new Map<HookEvent, ErasedHookFn[]>()

	constructor(config?: HookConfig) {
		if (config) {
			this.loadConfig(config)
		}
	}

	register<E extends HookEvent>(event: E, hook: HookHandler<E>): HookDispose {
		const stored: ErasedHookFn = hook
		this.addHook(event, stored)

		let disposed = false
		return () => {
			if (disposed) return
			disposed = true
			const current = this.hooks.get(event)
			if (!current) return
			const idx = current.indexOf(stored)
			if (idx !== -1) current.splice(idx, 1)
		}
	}

	/**
	 * Runs every hook for a gating event in registration order. A hook that
	 * throws a plain error denies the operation with {@link HookDeniedError};
	 * tidemark errors pass through unchanged.
	 */
	gate<E extends HookEvent>(event: E, ctx: HookEventContextMap[E]): void {
		for (const hook of this.snapshot(event)) {
			try {
				hook(ctx)
			} catch (err) {
				if (err instanceof TidemarkError) throw err
				throw new HookDeniedError(event, err instanceof Error ? err.message : String(err))
			}
		}
	}

	/** Runs every hook for an observing event; failures are logged. */
	notify<E extends HookEvent>(event: E, ctx: HookEventContextMap[E]): void {
		for (const hook of this.snapshot(event)) {
			try {
				hook(ctx)
			} catch (err) {
				log.warn({ err, event }, 'hook failed')
			}
		}
	}

	has(event: HookEvent): boolean {
		const list = this.hooks.get(event)
		return list !== undefined && list.length > 0
	}

	count(event: HookEvent): number {
		return this.hooks.get(event)?.length ?? 0
	}

	clear(event?: HookEvent): void {
		if (event) {
			this.hooks.delete(event)
		} else {
			this.hooks.clear()
		}
	}

	private snapshot<E extends HookEvent>(event: E): HookHandler<E>[] {
		const list = this.hooks.get(event)
		if (!list || list.length === 0) return []
		return list.slice() as HookHandler<E>[]
	}

	private addHook(event: HookEvent, hook: ErasedHookFn): void {
		const list = this.hooks.get(event)
		if (list) {
			list.push(hook)
		} else {
			this.hooks.set(event, [hook])
		}
	}

	private loadConfig(config: HookConfig): void {
		for (const [configKey, event] of Object.entries(HOOK_CONFIG_MAP)) {
			const value = config[configKey as keyof HookConfig]
			if (!value) continue

			const hooks = Array.isArray(value) ? value : [value]
			for (const hook of hooks) {
				this.addHook(event, hook as ErasedHookFn)
			}
		}
	}
}
