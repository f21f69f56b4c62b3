import { describe, it, expect } from 'vitest'

import { parseFlagIds } from './flag-ids'

describe('parseFlagIds', () => {
  it('should accept any separators', () => {
    expect(parseFlagIds('71190, 12\n5;12 x 300')).toEqual([5, 12, 300, 71190])
  })

  it('should return nothing without digits', () => {
    expect(parseFlagIds('')).toEqual([])
    expect(parseFlagIds('none, here')).toEqual([])
  })

  it('should read a minus sign as a separator', () => {
    expect(parseFlagIds('-7')).toEqual([7])
  })
})
