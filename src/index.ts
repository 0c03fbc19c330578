/**
 * Copyright 2026 Arm Limited
 *
 * Licensed under the Apache License, Version 2.0 (the "License");
 * you may not use this file except in compliance with the License.
 * You may obtain a copy of the License at
 *
 *     http://www.apache.org/licenses/LICENSE-2.0
 *
 * Unless required by applicable law or agreed to in writing, software
 * distributed under the License is distributed on an "AS IS" BASIS,
 * WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
 * See the License for the specific language governing permissions and
 * limitations under the License.
 */

export * from './errors';
export { createLogger, logger, type Logger } from './logger';
export { MapStatsDump, toStatsDumps, type StatsDump } from './stats-dump/stats-dump';
export {
    add, BinaryNode, box, Constant, div, FieldValue, isValueNode, mul, QueryNode, sub,
    type BinaryOperator, type Operand, type ValueNode,
} from './query/value-node';
export { CPI, DerivedRatio, IPC } from './query/derived-ratio';
export { Accumulate, ArithmeticMean, GeometricMean, HarmonicMean, QueryFunction } from './query/functions';
export {
    SlidingArithmeticMean, SlidingGeometricMean, SlidingHarmonicMean, SlidingSum, SlidingWindow, SlidingWindowFunction,
} from './query/sliding-window';
export {
    BoundArguments, createNodeRegistry, DEFAULT_NODE_REGISTRY, defineNode,
    type ExtraNames, type NodeFactory, type NodeRegistry, type ParameterKind, type ParameterSpec,
} from './query/node-registry';
export { parseExpression, Parser, type ASTNode, type ParseResult } from './query/expression-parser';
export { build, QueryBuilder } from './query/query-builder';
export { type Batch, firstOfBatch, type WindowOptions, WindowedIterator, windowedIterate } from './stream/windowed-iterator';
export { DEFAULT_SEPARATOR, type ErrorPolicy, QueryReport, type ReportOptions, runReport } from './report/query-report';
export { collectSeries, DEFAULT_X_EXPRESSION, type Series, type SeriesOptions, type SeriesResult } from './report/series-collector';
export { type QueryFile, QueryFileReader } from './report/query-file-reader';
export { type FileReader, NodeFileReader } from './file-reader';
