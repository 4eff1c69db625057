import type {
  AdvanceHookContext,
  AppendHookContext,
  CompactionResult,
  RefreshResult,
} from '../types.js'

export type HookEvent =
  | 'beforeAppend'
  | 'afterAppend'
  | 'beforeAdvance'
  | 'afterAdvance'
  | 'afterRefresh'
  | 'afterCompact'

export interface HookEventContextMap {
  beforeAppend: AppendHookContext
  afterAppend: AppendHookContext & { seq: number; committedAt: number }
  beforeAdvance: AdvanceHookContext
  afterAdvance: AdvanceHookContext
  afterRefresh: RefreshResult
  afterCompact: CompactionResult
}

export type HookHandler<E extends HookEvent> = (ctx: HookEventContextMap[E]) => void

export type HookDispose = () => void
