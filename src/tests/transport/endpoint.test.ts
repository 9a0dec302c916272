import { describe, it, expect } from 'vitest'
import { resolveEndpoint } from '../../transport/endpoint'

describe('resolveEndpoint', () => {
  it('appends the path to a bare origin', () => {
    expect(resolveEndpoint('http://localhost:50052', '/mutex/request')).toBe('http://localhost:50052/mutex/request')
  })

  it('keeps a path prefix with or without a trailing slash', () => {
    expect(resolveEndpoint('http://gateway.test/peer-1', '/mutex/release')).toBe(
      'http://gateway.test/peer-1/mutex/release'
    )
    expect(resolveEndpoint('http://gateway.test/peer-1/', 'mutex/release')).toBe(
      'http://gateway.test/peer-1/mutex/release'
    )
  })
})
