import { describe, it, expect } from 'vitest'
import { BoundedQueue } from '../../../src/core/bounded-queue'

describe('BoundedQueue', () => {
    it('rejects a non-positive capacity', () => {
        expect(() => new BoundedQueue<string>(0)).toThrow('Queue capacity must be a positive integer')
    })

    it('hands items out in arrival order', async () => {
        const queue = new BoundedQueue<string>(3)
        queue.offer('a')
        queue.offer('b')
        queue.offer('c')

        expect(await queue.take()).toBe('a')
        expect(await queue.take()).toBe('b')
        expect(await queue.take()).toBe('c')
        expect(queue.size).toBe(0)
    })

    it('drops the new item when full and keeps the queued ones', async () => {
        const queue = new BoundedQueue<string>(2)
        expect(queue.offer('first')).toBe(true)
        expect(queue.offer('second')).toBe(true)

        expect(queue.offer('third')).toBe(false)
        expect(queue.size).toBe(2)

        expect(await queue.take()).toBe('first')
        expect(await queue.take()).toBe('second')
    })

    it('parks take() while empty and wakes it on offer', async () => {
        const queue = new BoundedQueue<string>(1)
        let received: string | null | undefined
        const pending = queue.take().then(item => {
            received = item
        })

        await Promise.resolve()
        expect(received).toBeUndefined()

        expect(queue.offer('late')).toBe(true)
        await pending
        expect(received).toBe('late')
        expect(queue.size).toBe(0)
    })

    it('serves parked consumers in the order they arrived', async () => {
        const queue = new BoundedQueue<number>(1)
        const first = queue.take()
        const second = queue.take()

        queue.offer(1)
        queue.offer(2)

        expect(await first).toBe(1)
        expect(await second).toBe(2)
    })

    it('drains queued items after close, then yields null', async () => {
        const queue = new BoundedQueue<string>(4)
        queue.offer('x')
        queue.close()

        expect(queue.offer('y')).toBe(false)
        expect(await queue.take()).toBe('x')
        expect(await queue.take()).toBeNull()
    })

    it('releases parked consumers with null on close', async () => {
        const queue = new BoundedQueue<string>(4)
        const pending = queue.take()
        queue.close()

        expect(await pending).toBeNull()
        expect(queue.offer('late')).toBe(false)
        expect(await queue.take()).toBeNull()
    })

    it('keeps order across internal compaction', async () => {
        const queue = new BoundedQueue<number>(5000)
        for (let i = 0; i < 3000; i++) queue.offer(i)

        const seen: number[] = []
        for (let i = 0; i < 2000; i++) seen.push((await queue.take()) ?? -1)
        for (let i = 3000; i < 3500; i++) queue.offer(i)
        while (queue.size > 0) seen.push((await queue.take()) ?? -1)

        expect(seen).toHaveLength(3500)
        expect(seen.every((value, index) => value === index)).toBe(true)
    })
})
