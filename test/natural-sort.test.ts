import { describe, it } from 'node:test'
import assert from 'node:assert/strict'
import { compareNatural, naturalSortKey } from '../src/natural-sort.ts'

describe('naturalSortKey', () => {
  it('splits names into text and number tokens', () => {
    assert.deepEqual(naturalSortKey('frame_10.png'), ['frame_', 10, '.png'])
  })

  it('lowercases the text tokens', () => {
    assert.deepEqual(naturalSortKey('Frame_2.PNG'), ['frame_', 2, '.png'])
  })

  it('starts with an empty text token when the name starts with digits', () => {
    assert.deepEqual(naturalSortKey('42'), ['', 42, ''])
  })
})

describe('compareNatural', () => {
  it('orders numeric runs as integers', () => {
    const files = ['frame_10.png', 'frame_2.png', 'frame_0.png', 'frame_1.png', 'frame_100.png']
    assert.deepEqual(files.sort(compareNatural), [
      'frame_0.png',
      'frame_1.png',
      'frame_2.png',
      'frame_10.png',
      'frame_100.png',
    ])
  })

  it('puts frame_2 before frame_10', () => {
    assert.ok(compareNatural('frame_2.png', 'frame_10.png') < 0)
  })

  it('compares text case-insensitively', () => {
    assert.equal(compareNatural('FRAME_3.png', 'frame_3.png'), 0)
  })

  it('orders a prefix first', () => {
    assert.ok(compareNatural('frame_1', 'frame_1.png') < 0)
  })
})
