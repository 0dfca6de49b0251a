import { ConnectionRole } from '@scanlink/shared'
import { decodeFrame, frameType, parsePairingRequest, parseRegistration } from '../websocket/protocol.js'

describe('decodeFrame / frameType', () => {
  it('decodes JSON and reads the type', () => {
    const payload = decodeFrame('{"type":"register","login":"alice"}')
    expect(payload).toEqual({ type: 'register', login: 'alice' })
    expect(frameType(payload)).toBe('register')
  })

  it('returns undefined for anything that is not JSON', () => {
    expect(decodeFrame('not json')).toBeUndefined()
    expect(frameType(undefined)).toBeUndefined()
  })

  it('returns undefined for a missing or non-string type', () => {
    expect(frameType({ kind: 'register' })).toBeUndefined()
    expect(frameType({ type: 3 })).toBeUndefined()
    expect(frameType([1, 2])).toBeUndefined()
  })
})

describe('parseRegistration', () => {
  it('accepts a role by name', () => {
    expect(parseRegistration({ type: 'register', login: 'alice', role: 'writer' })).toEqual({
      credentials: { token: undefined, login: 'alice' },
      role: ConnectionRole.Writer,
    })
  })

  it('accepts a numeric role', () => {
    expect(parseRegistration({ type: 'register', login: 'alice', role: 3 })?.role).toBe(ConnectionRole.ReadWriter)
  })

  it('maps the is_input flag', () => {
    expect(parseRegistration({ type: 'register', login: 'a', is_input: true })?.role).toBe(ConnectionRole.Writer)
    expect(parseRegistration({ type: 'register', login: 'a', is_input: false })?.role).toBe(ConnectionRole.Reader)
  })

  it('lets an explicit role win over is_input', () => {
    expect(parseRegistration({ type: 'register', login: 'a', role: 'reader', is_input: true })?.role).toBe(
      ConnectionRole.Reader,
    )
  })

  it('defaults to None', () => {
    expect(parseRegistration({ type: 'register', login: 'a' })?.role).toBe(ConnectionRole.None)
  })

  it('trims the login and passes the token through', () => {
    expect(parseRegistration({ type: 'register', login: '  alice ', token: 'abc' })?.credentials).toEqual({
      token: 'abc',
      login: 'alice',
    })
  })

  it('rejects unknown roles, other frame types and junk', () => {
    expect(parseRegistration({ type: 'register', login: 'a', role: 'admin' })).toBeNull()
    expect(parseRegistration({ type: 'register', login: 'a', role: 4 })).toBeNull()
    expect(parseRegistration({ type: 'new_pairing', platform: 1 })).toBeNull()
    expect(parseRegistration({ type: 'register', login: 42 })).toBeNull()
    expect(parseRegistration(undefined)).toBeNull()
  })
})

describe('parsePairingRequest', () => {
  it('accepts numbers and numeric strings', () => {
    expect(parsePairingRequest({ type: 'new_pairing', platform: 5, product: 42 })).toEqual({ platform: 5, product: 42 })
    expect(parsePairingRequest({ type: 'new_pairing', platform: ' 12 ', product: '0042' })).toEqual({
      platform: 12,
      product: 42,
    })
  })

  it('treats a missing or null product as a platform-only report', () => {
    expect(parsePairingRequest({ type: 'new_pairing', platform: 5 })).toEqual({ platform: 5, product: null })
    expect(parsePairingRequest({ type: 'new_pairing', platform: 5, product: null })).toEqual({
      platform: 5,
      product: null,
    })
  })

  it('rejects non-integer ids', () => {
    expect(parsePairingRequest({ type: 'new_pairing', platform: 'abc', product: 1 })).toBeNull()
    expect(parsePairingRequest({ type: 'new_pairing', platform: 1.5, product: 1 })).toBeNull()
    expect(parsePairingRequest({ type: 'new_pairing', product: 1 })).toBeNull()
  })

  it('rejects ids that a number cannot hold exactly', () => {
    expect(parsePairingRequest({ type: 'new_pairing', platform: 5, product: '9007199254740993' })).toBeNull()
    expect(parsePairingRequest({ type: 'new_pairing', platform: 2 ** 53, product: 1 })).toBeNull()
    expect(parsePairingRequest({ type: 'new_pairing', platform: 5, product: '9007199254740991' })).toEqual({
      platform: 5,
      product: 9007199254740991,
    })
  })
})
