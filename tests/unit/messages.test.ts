import { describe, it, expect } from 'vitest'
import { createMessageRenderer, loadMessages } from '../../src/messages.js'
import { MessagesError } from '../../src/errors.js'

describe('messages', () => {
  const messages = loadMessages()
  const renderer = createMessageRenderer(messages)

  it('should fill placeholders from vars', () => {
    expect(renderer.render('offer_confirm', { amount: 10, denom: 'USD', accountName: 'Bob Personal', handle: 'bob' }))
      .toBe('Offer 10 USD to Bob Personal (bob)?')
  })

  it('should leave unknown placeholders in place', () => {
    expect(renderer.render('accept_all_complete')).toBe('✅ Accepted {count} offer(s).')
  })

  it('should mark a missing key instead of throwing', () => {
    expect(renderer.render('no_such_key')).toBe('[Missing message: no_such_key]')
    expect(renderer.has('no_such_key')).toBe(false)
  })

  it('should have a message for every error kind', () => {
    for (const kind of ['state_conflict', 'state_invalid', 'authentication', 'network', 'api', 'system']) {
      expect(renderer.has(`error_${kind}`)).toBe(true)
    }
  })

  it('should fail to load a file that does not exist', () => {
    expect(() => loadMessages('/nonexistent/messages.json')).toThrow(MessagesError)
  })
})
