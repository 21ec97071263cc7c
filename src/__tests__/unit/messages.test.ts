import { beforeEach, describe, expect, it } from 'vitest'
import { NotFoundError, SelfReferenceError } from '@/lib/api'
import type { CommunityCore } from '@/services'
import type { MemoryDatabase } from '@/services/repositories'
import { createTestCore, type TestClock } from '../helpers/factories'

describe('MessageService', () => {
  let core: CommunityCore
  let memory: MemoryDatabase
  let clock: TestClock

  beforeEach(() => {
    ;({ core, memory, clock } = createTestCore())
  })

  describe('sendMessage', () => {
    it('opens a conversation rooted at itself', async () => {
      const message = await core.messages.sendMessage('alice', {
        receiverId: 'bob',
        content: 'Hi Bob',
      })

      expect(message).toEqual({
        id: message.id,
        parentId: null,
        rootId: message.id,
        authorId: 'alice',
        receiverId: 'bob',
        content: 'Hi Bob',
        createdAt: '2024-03-01T12:00:00.000Z',
      })
    })

    it('refuses a message to oneself before writing', async () => {
      await expect(
        core.messages.sendMessage('alice', { receiverId: 'alice', content: 'Note to self' })
      ).rejects.toBeInstanceOf(SelfReferenceError)
      expect(memory.messages.size).toBe(0)
    })
  })

  describe('replyToMessage', () => {
    it('addresses the reply to the parent author whatever the request says', async () => {
      const opening = await core.messages.sendMessage('alice', { receiverId: 'bob', content: 'Hi' })

      const reply = await core.messages.replyToMessage('bob', {
        parentId: opening.id,
        content: 'Hello',
        receiverId: 'carol',
      })

      expect(reply.receiverId).toBe('alice')
      expect(reply.parentId).toBe(opening.id)
      expect(reply.rootId).toBe(opening.id)
    })

    it('refuses a reply to one\'s own message before writing', async () => {
      const opening = await core.messages.sendMessage('alice', { receiverId: 'bob', content: 'Hi' })

      await expect(
        core.messages.replyToMessage('alice', { parentId: opening.id, content: 'Anyone?' })
      ).rejects.toThrow('Cannot reply to your own message')
      expect(memory.messages.size).toBe(1)
    })

    it('keeps the conversation root through a chain of replies', async () => {
      const opening = await core.messages.sendMessage('alice', { receiverId: 'bob', content: 'Hi' })
      const second = await core.messages.replyToMessage('bob', { parentId: opening.id, content: 'Hey' })
      const third = await core.messages.replyToMessage('alice', { parentId: second.id, content: 'Lunch?' })

      expect(third).toMatchObject({
        parentId: second.id,
        rootId: opening.id,
        authorId: 'alice',
        receiverId: 'bob',
      })
    })

    it('lets a third user answer and addresses the parent author', async () => {
      const opening = await core.messages.sendMessage('alice', { receiverId: 'bob', content: 'Hi' })

      const reply = await core.messages.replyToMessage('carol', { parentId: opening.id, content: 'Me too' })

      expect(reply.receiverId).toBe('alice')
    })

    it('reports a missing parent', async () => {
      await expect(
        core.messages.replyToMessage('bob', { parentId: 'missing', content: 'Hello' })
      ).rejects.toThrow('Parent message not found')
      expect(memory.messages.size).toBe(0)
    })
  })

  it('does not let a returned message change the stored one', async () => {
    const message = await core.messages.sendMessage('alice', { receiverId: 'bob', content: 'Hi' })

    message.receiverId = 'carol'
    message.parentId = message.id

    expect(await core.messages.getMessage(message.id)).toMatchObject({
      receiverId: 'bob',
      parentId: null,
    })
  })

  it('keeps concurrent conversations apart', async () => {
    const [withBob, withCarol] = await Promise.all([
      core.messages.sendMessage('alice', { receiverId: 'bob', content: 'Hi Bob' }),
      core.messages.sendMessage('alice', { receiverId: 'carol', content: 'Hi Carol' }),
    ])

    await Promise.all([
      core.messages.replyToMessage('bob', { parentId: withBob.id, content: 'B1' }),
      core.messages.replyToMessage('carol', { parentId: withCarol.id, content: 'C1' }),
      core.messages.replyToMessage('dave', { parentId: withBob.id, content: 'B2' }),
    ])

    const bobThread = await core.messages.getMessageReplies(withBob.id)
    const carolThread = await core.messages.getMessageReplies(withCarol.id)

    expect(bobThread.map((message) => message.content)).toEqual(['B1', 'B2'])
    expect(bobThread.every((message) => message.rootId === withBob.id)).toBe(true)
    expect(carolThread).toHaveLength(1)
    expect(carolThread[0]).toMatchObject({ content: 'C1', receiverId: 'alice', rootId: withCarol.id })
  })

  describe('getMessagesForUser', () => {
    it('lists conversations opened towards the user, newest first', async () => {
      const first = await core.messages.sendMessage('alice', { receiverId: 'bob', content: 'One' })
      clock.advance()
      const second = await core.messages.sendMessage('carol', { receiverId: 'bob', content: 'Two' })
      await core.messages.sendMessage('bob', { receiverId: 'alice', content: 'Outgoing' })
      await core.messages.replyToMessage('alice', { parentId: second.id, content: 'Not a root' })

      const inbox = await core.messages.getMessagesForUser('bob')

      expect(inbox.map((message) => message.id)).toEqual([second.id, first.id])
    })

    it('returns an empty inbox for an unknown user', async () => {
      expect(await core.messages.getMessagesForUser('nobody')).toEqual([])
    })
  })

  describe('getMessageReplies', () => {
    it('lists direct replies oldest first', async () => {
      const opening = await core.messages.sendMessage('alice', { receiverId: 'bob', content: 'Hi' })
      const a = await core.messages.replyToMessage('bob', { parentId: opening.id, content: 'A' })
      const b = await core.messages.replyToMessage('carol', { parentId: opening.id, content: 'B' })
      await core.messages.replyToMessage('alice', { parentId: a.id, content: 'Nested' })

      const replies = await core.messages.getMessageReplies(opening.id)

      expect(replies.map((message) => message.id)).toEqual([a.id, b.id])
    })

    it('reports a missing parent', async () => {
      await expect(core.messages.getMessageReplies('missing')).rejects.toBeInstanceOf(NotFoundError)
    })
  })

  describe('editMessage', () => {
    it('lets the sender edit the content', async () => {
      const opening = await core.messages.sendMessage('alice', { receiverId: 'bob', content: 'Hi' })

      const edited = await core.messages.editMessage(opening.id, 'alice', { content: 'Hi there' })

      expect(edited.content).toBe('Hi there')
      expect(edited.receiverId).toBe('bob')
    })

    it('does not let the receiver edit', async () => {
      const opening = await core.messages.sendMessage('alice', { receiverId: 'bob', content: 'Hi' })

      await expect(
        core.messages.editMessage(opening.id, 'bob', { content: 'Changed' })
      ).rejects.toThrow('You can only edit your own messages')
    })
  })
})
