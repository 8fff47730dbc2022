import { describe, it, expect } from 'vitest'
import {
  analyzeArithmeticCode,
  detectArithmeticCode,
  stripCommentsAndStrings,
  extractInlineScripts,
  collectScriptSources,
} from '../code.js'

describe('analyzeArithmeticCode', () => {
  it('finds a function declaration with arithmetic', () => {
    const code = 'function add(a, b) {\n  return a + b\n}'
    expect(analyzeArithmeticCode(code)).toEqual({ hasFunctions: true, hasOperators: true })
    expect(detectArithmeticCode(code)).toBe(true)
  })

  it('finds arrow functions and compound assignment', () => {
    expect(detectArithmeticCode('const total = items.reduce((sum, x) => { sum += x; return sum }, 0)')).toBe(true)
  })

  it('ignores operators inside strings and comments', () => {
    const code = 'function show() {\n  // a + b\n  console.log("1 + 1")\n}'
    expect(analyzeArithmeticCode(code)).toEqual({ hasFunctions: true, hasOperators: false })
  })

  it('reports no functions for a bare expression', () => {
    expect(analyzeArithmeticCode('x = y * 2')).toEqual({ hasFunctions: false, hasOperators: true })
  })

  it('does not treat control flow as a method definition', () => {
    expect(analyzeArithmeticCode('if (ready) {\n  x = y - 1\n}').hasFunctions).toBe(false)
  })
})

describe('stripCommentsAndStrings', () => {
  it('blanks a quote inside a comment without opening a string', () => {
    expect(stripCommentsAndStrings("a // don't\nb")).toBe('a  \nb')
  })
})

describe('extractInlineScripts', () => {
  it('skips external and empty scripts', () => {
    const html = '<script src="a.js"></script><script>  </script><script type="module">run()</script>'
    expect(extractInlineScripts(html)).toEqual(['run()'])
  })
})

describe('collectScriptSources', () => {
  it('joins js files and inline scripts of html files', () => {
    const files = {
      'app.js': 'one()',
      'index.html': '<script>two()</script>',
      'README.md': '<script>three()</script>',
    }
    expect(collectScriptSources(files)).toBe('one()\ntwo()')
  })
})
