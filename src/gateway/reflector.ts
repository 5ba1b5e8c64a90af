import { ValidationError } from '../errors.js'
import { CapsuleManager } from '../capsule/capsule.js'
import { project, snapshotHash } from '../capsule/snapshot.js'
import { TurnLifecycle } from '../turns/lifecycle.js'
import type { ContemplationMode, TurnOutput } from '../turns/types.js'
import { KeyedLock } from '../util/keyed-lock.js'
import { isBlank } from '../util/text.js'
import { ContemplationService } from './service.js'

export interface ReflectOptions {
  /** Use seed content when the remote call fails. */
  fallback?: boolean
}

/**
 * Runs a contemplation mode for one Turn and stores the result with the
 * hash of the capsule snapshot that went out with it.
 */
export class TurnReflector {
  private lifecycle: TurnLifecycle
  private capsule: CapsuleManager
  private service: ContemplationService
  private lock: KeyedLock

  constructor(lifecycle: TurnLifecycle, capsule: CapsuleManager, service: ContemplationService, lock: KeyedLock) {
    this.lifecycle = lifecycle
    this.capsule = capsule
    this.service = service
    this.lock = lock
  }

  async reflect(turnId: string, mode: ContemplationMode, options: ReflectOptions = {}): Promise<TurnOutput> {
    return this.lock.run(turnId, async () => {
      const turn = this.lifecycle.require(turnId)
      if (isBlank(turn.transcriptRedactedActive)) {
        throw new ValidationError('transcript', `Turn ${turnId} has no transcript to reflect on`)
      }

      const snapshot = project(this.capsule.getOrCreate(), mode === 'talkItThrough' ? 'talk' : 'reflect')
      const request = {
        mode,
        text: turn.transcriptRedactedActive,
        recordedAt: turn.recordedAt,
        snapshot,
        previousResponseId: mode === 'talkItThrough' ? turn.talkLastResponseId : null
      }

      const startedAt = new Date()
      const result = options.fallback
        ? await this.service.generateWithFallback(request)
        : await this.service.generate(request)

      console.log(`[gateway] ${mode} for ${turnId} via ${result.provider}`)
      return this.lifecycle.recordReflection(turnId, {
        mode,
        text: result.text,
        promptVersion: result.promptVersion,
        provider: result.provider,
        capsuleSnapshotHash: snapshotHash(snapshot),
        responseId: result.responseId,
        startedAt,
        finishedAt: new Date()
      })
    })
  }
}
