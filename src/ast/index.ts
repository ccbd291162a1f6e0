export { createNumber, createVariable, createOperator } from './factory.js';
export { nodesEqual } from './equality.js';
export { toPrefix, toInfix, toPostfix, toTreeString, render } from './printer.js';
export { traverse, countNodes, treeDepth, collectVariables } from './visitor.js';
