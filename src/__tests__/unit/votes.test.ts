import { beforeEach, describe, expect, it, vi } from 'vitest'
import {
  ConflictError,
  InternalError,
  InvalidTargetError,
  NoOpError,
  NotFoundError,
  ValidationError,
} from '@/lib/api'
import type { CommunityCore } from '@/services'
import { MemoryDatabase, MemoryVoteStore, MemoryVoteTransaction } from '@/services/repositories'
import { createPost, createTestCore } from '../helpers/factories'

describe('VoteService', () => {
  let core: CommunityCore
  let memory: MemoryDatabase
  let postId: string

  beforeEach(async () => {
    ;({ core, memory } = createTestCore())
    postId = (await createPost(core)).id
  })

  async function postKarma(): Promise<number> {
    return (await core.posts.getPost(postId)).karma
  }

  it('tracks karma through cast, change and remove across two voters', async () => {
    expect((await core.votes.castVote('alice', { postId, value: 1 })).score).toBe(1)
    expect((await core.votes.castVote('bob', { postId, value: 1 })).score).toBe(2)

    const change = await core.votes.changeVote('alice', { postId, value: -1 })
    expect(change.delta).toBe(-2)
    expect(change.score).toBe(0)

    const removal = await core.votes.removeVote('bob', { postId })
    expect(removal).toEqual({ vote: null, delta: -1, score: -1 })
    expect(await postKarma()).toBe(-1)
  })

  it('returns the stored vote on cast', async () => {
    const outcome = await core.votes.castVote('alice', { postId, value: -1 })

    expect(outcome.delta).toBe(-1)
    expect(outcome.vote).toEqual({
      id: `alice_post_${postId}`,
      userId: 'alice',
      targetId: postId,
      targetType: 'post',
      value: -1,
      createdAt: '2024-03-01T12:00:00.000Z',
    })
  })

  it('rejects a second vote by the same user on the same target', async () => {
    await core.votes.castVote('alice', { postId, value: 1 })

    await expect(core.votes.castVote('alice', { postId, value: -1 })).rejects.toBeInstanceOf(
      ConflictError
    )
    expect(await postKarma()).toBe(1)
    expect(memory.votes.size).toBe(1)
  })

  it('restores the score when a cast is removed', async () => {
    await core.votes.castVote('bob', { postId, value: 1 })
    const before = await postKarma()

    await core.votes.castVote('alice', { postId, value: -1 })
    await core.votes.removeVote('alice', { postId })

    expect(await postKarma()).toBe(before)
    expect(memory.votes.has(`alice_post_${postId}`)).toBe(false)
  })

  it('applies +2 when a downvote becomes an upvote', async () => {
    await core.votes.castVote('alice', { postId, value: -1 })

    const outcome = await core.votes.changeVote('alice', { postId, value: 1 })

    expect(outcome.delta).toBe(2)
    expect(outcome.score).toBe(1)
    expect(outcome.vote?.value).toBe(1)
    expect((await core.votes.getVote('alice', { postId })).value).toBe(1)
  })

  it('rejects a change to the current value as a no-op', async () => {
    await core.votes.castVote('alice', { postId, value: 1 })

    await expect(core.votes.changeVote('alice', { postId, value: 1 })).rejects.toBeInstanceOf(
      NoOpError
    )
    expect(await postKarma()).toBe(1)
  })

  it('reports a missing vote on change and remove', async () => {
    await expect(core.votes.changeVote('alice', { postId, value: 1 })).rejects.toThrow(
      'Vote not found'
    )
    await expect(core.votes.removeVote('alice', { postId })).rejects.toBeInstanceOf(NotFoundError)
    expect(await postKarma()).toBe(0)
  })

  it('reports a missing target and stores no vote', async () => {
    await expect(
      core.votes.castVote('alice', { postId: 'missing', value: 1 })
    ).rejects.toThrow('Post not found')
    expect(memory.votes.size).toBe(0)
  })

  it('rejects a vote naming both or neither target before touching storage', async () => {
    const transaction = vi.spyOn(MemoryVoteStore.prototype, 'runTransaction')
    const read = vi.spyOn(MemoryVoteStore.prototype, 'getVote')

    await expect(
      core.votes.castVote('alice', { postId, commentId: 'c-1', value: 1 })
    ).rejects.toBeInstanceOf(InvalidTargetError)
    await expect(core.votes.removeVote('alice', {})).rejects.toBeInstanceOf(InvalidTargetError)
    await expect(core.votes.getVote('alice', {})).rejects.toBeInstanceOf(InvalidTargetError)

    expect(transaction).not.toHaveBeenCalled()
    expect(read).not.toHaveBeenCalled()
  })

  it('validates the request shape', async () => {
    await expect(core.votes.castVote('alice', { postId: '', value: 1 })).rejects.toBeInstanceOf(
      ValidationError
    )
  })

  it('scores comments separately from their post', async () => {
    const comment = await core.comments.addComment('carol', { postId, content: 'First!' })

    await core.votes.castVote('alice', { commentId: comment.id, value: 1 })
    await core.votes.castVote('bob', { commentId: comment.id, value: 1 })

    expect((await core.comments.getComment(comment.id)).karma).toBe(2)
    expect(await postKarma()).toBe(0)
    expect((await core.votes.getVote('alice', { commentId: comment.id })).targetType).toBe('comment')
  })

  it('serializes concurrent casts by the same user', async () => {
    const results = await Promise.allSettled([
      core.votes.castVote('alice', { postId, value: 1 }),
      core.votes.castVote('alice', { postId, value: 1 }),
    ])

    expect(results.map((result) => result.status)).toEqual(['fulfilled', 'rejected'])
    const rejected = results[1]
    expect(rejected.status === 'rejected' && rejected.reason).toBeInstanceOf(ConflictError)
    expect(await postKarma()).toBe(1)
  })

  it('keeps every vote of many concurrent voters', async () => {
    const voters = ['u1', 'u2', 'u3', 'u4', 'u5', 'u6']
    await Promise.all(
      voters.map((userId, index) =>
        core.votes.castVote(userId, { postId, value: index % 3 === 0 ? -1 : 1 })
      )
    )

    // u1 and u4 downvote, the other four upvote
    expect(await postKarma()).toBe(2)
    expect(memory.votes.size).toBe(6)
  })

  it('does not let a returned vote change the ledger', async () => {
    const outcome = await core.votes.castVote('alice', { postId, value: 1 })
    if (outcome.vote) outcome.vote.value = -1
    const read = await core.votes.getVote('alice', { postId })
    read.value = -1

    expect((await core.votes.getVote('alice', { postId })).value).toBe(1)

    const removal = await core.votes.removeVote('alice', { postId })
    expect(removal.delta).toBe(-1)
    expect(await postKarma()).toBe(0)
  })

  describe('when the karma write fails', () => {
    it('rolls back a cast', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => undefined)
      vi.spyOn(MemoryVoteTransaction.prototype, 'setScore').mockRejectedValueOnce(
        new Error('disk full')
      )

      await expect(core.votes.castVote('alice', { postId, value: 1 })).rejects.toBeInstanceOf(
        InternalError
      )
      expect(memory.votes.size).toBe(0)
      expect(await postKarma()).toBe(0)
      expect(console.error).toHaveBeenCalledTimes(1)

      await expect(core.votes.castVote('alice', { postId, value: 1 })).resolves.toMatchObject({
        score: 1,
      })
    })

    it('rolls back a change', async () => {
      await core.votes.castVote('alice', { postId, value: 1 })
      vi.spyOn(console, 'error').mockImplementation(() => undefined)
      vi.spyOn(MemoryVoteTransaction.prototype, 'setScore').mockRejectedValueOnce(
        new Error('disk full')
      )

      await expect(core.votes.changeVote('alice', { postId, value: -1 })).rejects.toThrow(
        'Failed to changeVote; vote and karma left unchanged'
      )
      expect((await core.votes.getVote('alice', { postId })).value).toBe(1)
      expect(await postKarma()).toBe(1)
    })

    it('rolls back a removal', async () => {
      await core.votes.castVote('alice', { postId, value: -1 })
      vi.spyOn(console, 'error').mockImplementation(() => undefined)
      vi.spyOn(MemoryVoteTransaction.prototype, 'setScore').mockRejectedValueOnce(
        new Error('disk full')
      )

      await expect(core.votes.removeVote('alice', { postId })).rejects.toBeInstanceOf(InternalError)
      expect(memory.votes.get(`alice_post_${postId}`)?.value).toBe(-1)
      expect(await postKarma()).toBe(-1)
    })
  })
})
