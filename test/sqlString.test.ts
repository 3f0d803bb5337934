import { quoteIdentifier, quoteString } from '../src/sqlString'

describe('quoteIdentifier', () => {
  it('wraps names in backticks', () => {
    expect(quoteIdentifier('users')).toBe('`users`')
  })

  it('doubles embedded backticks', () => {
    expect(quoteIdentifier('a`b')).toBe('`a``b`')
  })

  it('joins table and field', () => {
    expect(quoteIdentifier('users', 'id')).toBe('`users`.`id`')
  })
})

describe('quoteString', () => {
  it('escapes quotes and backslashes', () => {
    expect(quoteString(`it's "a" \\ test`)).toBe(`'it\\'s \\"a\\" \\\\ test'`)
  })

  it('escapes control characters', () => {
    expect(quoteString('a\0b\nc\rd\te\x1a\b')).toBe(
      "'a\\0b\\nc\\rd\\te\\Z\\b'"
    )
  })
})
