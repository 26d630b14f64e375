export { makeCircles, type LabelledPoint } from './Datasets';
export { toDot, traceGraph, type DotOptions, type Edge, type TracedGraph } from './GraphDot';
export { Losses } from './Losses';
export { Layer, MLP, Module, Neuron, type NeuronOptions } from './NeuralNet';
export { SGD, type OptimizerOptions } from './Optimizers';
export { mulberry32, type RandomSource } from './Random';
export { V } from './V';
export { Value, opSymbol, type OpTag, type Operand } from './Value';
export { AutogradError, InvalidExponent, InvalidOperand } from './ValueErrors';
