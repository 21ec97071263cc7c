import { beforeEach, describe, expect, it } from 'vitest'
import { AuthorizationError, NotFoundError, ValidationError } from '@/lib/api'
import type { CommunityCore } from '@/services'
import { createPost, createTestCore, type TestClock } from '../helpers/factories'

describe('PostService', () => {
  let core: CommunityCore
  let clock: TestClock

  beforeEach(() => {
    ;({ core, clock } = createTestCore())
  })

  it('creates posts with zero karma', async () => {
    const post = await createPost(core, { authorId: 'alice', communityId: 'typescript' })

    expect(post).toMatchObject({
      title: 'Test post',
      content: 'Test post body',
      authorId: 'alice',
      communityId: 'typescript',
      karma: 0,
      createdAt: '2024-03-01T12:00:00.000Z',
    })
    expect(await core.posts.getPost(post.id)).toEqual(post)
  })

  it('requires a title', async () => {
    await expect(
      core.posts.createPost('alice', { title: '', content: 'Body' })
    ).rejects.toBeInstanceOf(ValidationError)
  })

  it('does not let a returned post change the stored one', async () => {
    const post = await createPost(core, { authorId: 'alice' })

    post.karma = 50
    post.authorId = 'mallory'

    const stored = await core.posts.getPost(post.id)
    expect(stored.karma).toBe(0)
    expect(stored.authorId).toBe('alice')
  })

  it('lists community posts newest first', async () => {
    const older = await createPost(core, { communityId: 'typescript' })
    clock.advance()
    const newer = await createPost(core, { communityId: 'typescript' })
    await createPost(core, { communityId: 'rust' })

    const posts = await core.posts.getCommunityPosts('typescript')

    expect(posts.map((post) => post.id)).toEqual([newer.id, older.id])
  })

  it('reports a missing post', async () => {
    await expect(core.posts.getPost('missing')).rejects.toBeInstanceOf(NotFoundError)
  })

  describe('getFeedPosts', () => {
    it('lists every post newest first', async () => {
      const first = await createPost(core, { communityId: 'typescript' })
      clock.advance()
      const second = await createPost(core)
      clock.advance()
      const third = await createPost(core, { communityId: 'rust' })

      const feed = await core.posts.getFeedPosts()

      expect(feed.map((post) => post.id)).toEqual([third.id, second.id, first.id])
    })

    it('pages with limit and offset', async () => {
      const first = await createPost(core)
      const second = await createPost(core)
      await createPost(core)

      const page = await core.posts.getFeedPosts({ limit: 2, offset: 1 })

      expect(page.map((post) => post.id)).toEqual([second.id, first.id])
    })

    it('is empty without posts', async () => {
      expect(await core.posts.getFeedPosts()).toEqual([])
    })
  })

  describe('editPost', () => {
    it('changes the title and keeps karma', async () => {
      const post = await createPost(core, { authorId: 'alice' })
      await core.votes.castVote('bob', { postId: post.id, value: 1 })
      clock.advance(60_000)

      const edited = await core.posts.editPost(post.id, 'alice', { title: 'Renamed' })

      expect(edited).toEqual({
        ...post,
        title: 'Renamed',
        karma: 1,
        updatedAt: '2024-03-01T12:01:00.000Z',
      })
      expect(await core.posts.getPost(post.id)).toEqual(edited)
    })

    it('changes only the content when only content is given', async () => {
      const post = await createPost(core, { authorId: 'alice', title: 'Keep me' })

      const edited = await core.posts.editPost(post.id, 'alice', { content: 'New body' })

      expect(edited.title).toBe('Keep me')
      expect(edited.content).toBe('New body')
    })

    it('only lets the author edit', async () => {
      const post = await createPost(core, { authorId: 'alice' })

      await expect(
        core.posts.editPost(post.id, 'mallory', { title: 'Hijacked' })
      ).rejects.toBeInstanceOf(AuthorizationError)
      expect((await core.posts.getPost(post.id)).title).toBe('Test post')
    })

    it('requires a title or content', async () => {
      const post = await createPost(core, { authorId: 'alice' })

      await expect(core.posts.editPost(post.id, 'alice', {})).rejects.toBeInstanceOf(ValidationError)
    })

    it('reports a missing post', async () => {
      await expect(
        core.posts.editPost('missing', 'alice', { title: 'Anything' })
      ).rejects.toThrow('Post not found')
    })
  })
})
