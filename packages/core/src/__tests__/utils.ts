import test from 'ava'
import {formatDuration} from '../utils.js'

test('formatDuration: milliseconds below one second', t => {
  t.is(formatDuration(450), '450ms')
})

test('formatDuration: seconds with one decimal', t => {
  t.is(formatDuration(1500), '1.5s')
})

test('formatDuration: minutes and seconds', t => {
  t.is(formatDuration(125_000), '2m 5s')
})
