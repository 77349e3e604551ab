import process from 'node:process'
import test from 'ava'
import {EvaluationError, EvaluatorNotAvailableError} from '../../errors.js'
import {CommandEvaluator} from '../command-evaluator.js'
import type {EvaluationRequest} from '../evaluator.js'

const request: EvaluationRequest = {
  container: 'web',
  prefix: ['containers', 'web'],
  layers: [],
  imports: ['./common.nix']
}

function script(source: string): CommandEvaluator {
  return new CommandEvaluator({command: process.execPath, args: ['-e', source]})
}

test('evaluate: the request is sent on stdin', async t => {
  const evaluator = script([
    'let input = ""',
    'process.stdin.on("data", chunk => { input += chunk })',
    'process.stdin.on("end", () => { const req = JSON.parse(input); console.log("/nix/store/" + req.container + "-" + req.imports.length) })'
  ].join('\n'))
  t.is(await evaluator.evaluate(request), '/nix/store/web-1')
})

test('evaluate: the last non-empty line is the path', async t => {
  const evaluator = script('console.log("building..."); console.log("/nix/store/abc-web"); console.log("")')
  t.is(await evaluator.evaluate(request), '/nix/store/abc-web')
})

test('evaluate: a relative path is rejected', async t => {
  const error = await t.throwsAsync<EvaluationError>(script('console.log("result")').evaluate(request), {instanceOf: EvaluationError})
  t.is(error?.code, 'EVALUATOR_INVALID_OUTPUT')
  t.is(error?.message, 'Evaluator did not print an absolute path (got "result")')
})

test('evaluate: non-zero exit carries stderr', async t => {
  const evaluator = script('console.error("attribute missing"); process.exit(3)')
  const error = await t.throwsAsync<EvaluationError>(evaluator.evaluate(request), {instanceOf: EvaluationError})
  t.is(error?.code, 'EVALUATOR_FAILED')
  t.is(error?.message, 'Evaluator exited with code 3: attribute missing')
})

test('evaluate: a killed evaluator is a failure, not unavailable', async t => {
  const evaluator = script('process.kill(process.pid, "SIGTERM")')
  const error = await t.throwsAsync<EvaluationError>(evaluator.evaluate(request), {instanceOf: EvaluationError})
  t.false(error instanceof EvaluatorNotAvailableError)
  t.is(error?.code, 'EVALUATOR_FAILED')
  t.is(error?.message, 'Evaluator was terminated by SIGTERM')
  t.false(error?.transient)
})

test('evaluate: missing command is not available', async t => {
  const evaluator = new CommandEvaluator({command: 'berth-test-missing-evaluator'})
  const error = await t.throwsAsync<EvaluatorNotAvailableError>(evaluator.evaluate(request), {instanceOf: EvaluatorNotAvailableError})
  t.is(error?.code, 'EVALUATOR_NOT_AVAILABLE')
  t.true(error?.transient)
})
