import { describe, expect, it } from 'vitest'
import { readResultHeader } from './result.js'

describe('readResultHeader', () => {
  it('picks typed fields from the portal header', () => {
    expect(readResultHeader('{"header":{"isSuccessful":false,"resultCode":-1,"resultMessage":"실패"},"result":{}}'))
      .toEqual({ isSuccessful: false, resultCode: -1, resultMessage: '실패' })
  })

  it('ignores fields of the wrong type', () => {
    expect(readResultHeader('{"header":{"isSuccessful":"yes","resultCode":"0"}}'))
      .toEqual({ isSuccessful: undefined, resultCode: undefined, resultMessage: undefined })
  })

  it('returns null for non-JSON or header-less bodies', () => {
    expect(readResultHeader('<html></html>')).toBeNull()
    expect(readResultHeader('[1,2]')).toBeNull()
    expect(readResultHeader('{"result":1}')).toBeNull()
  })
})
