import test from 'ava'
import {compareNames, formatDuration} from '../utils.js'

test('compareNames: code-unit order', t => {
  t.deepEqual(['web', 'Web', 'db', 'a-b', 'a_b'].sort(compareNames), ['Web', 'a-b', 'a_b', 'db', 'web'])
})

test('compareNames: equal names compare as 0', t => {
  t.is(compareNames('web', 'web'), 0)
})

test('formatDuration: milliseconds below one second', t => {
  t.is(formatDuration(250), '250ms')
})

test('formatDuration: seconds with one decimal', t => {
  t.is(formatDuration(1500), '1.5s')
})

test('formatDuration: minutes and seconds', t => {
  t.is(formatDuration(125_000), '2m 5s')
})
