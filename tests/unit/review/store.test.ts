import { describe, expect, it } from 'vitest'
import { NotFoundError } from '../../../src/core/errors.js'
import { createResultStore, MemoryStore } from '../../../src/review/store.js'

describe('MemoryStore', () => {
    it('puts, gets and deletes by id', () => {
        const store = new MemoryStore<number>('session')
        store.put('a', 1)
        expect(store.get('a')).toBe(1)
        expect(store.has('a')).toBe(true)
        expect(store.size).toBe(1)
        expect(store.delete('a')).toBe(true)
        expect(store.get('a')).toBeUndefined()
        expect(store.delete('a')).toBe(false)
    })

    it('throws NotFoundError from require on a missing id', () => {
        const store = createResultStore()
        expect(() => store.require('missing')).toThrow(NotFoundError)
        expect(() => store.require('missing')).toThrow('Results not found: missing')
    })

    it('lists values in insertion order', () => {
        const store = new MemoryStore<string>('session')
        store.put('x', 'first')
        store.put('y', 'second')
        expect(store.values()).toEqual(['first', 'second'])
    })
})
