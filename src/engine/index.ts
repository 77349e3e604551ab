export {ContainerEvaluator, type EvaluationRequest, type ModuleLayer} from './evaluator.js'
export {CommandEvaluator, type CommandEvaluatorOptions} from './command-evaluator.js'
export {InlineBridge, injectedLayers, currentHostPlatform, type InlineBridgeOptions} from './inline-bridge.js'
