/**
 * Reads logic-tree documents: JSON files checked against
 * `schemas/logic-tree.schema.json` and built into a `BranchSet` tree whose
 * branch values are parsed by the uncertainty table.
 */

import fs from 'node:fs';
import path from 'node:path';
import { Ajv, type ErrorObject, type ValidateFunction } from 'ajv';
import logicTreeSchema from './schemas/logic-tree.schema.json' with { type: 'json' };
import {
  Branch,
  BranchSet,
  ConfigError,
  ContractViolationError,
  LogicTreeError,
  checkWeights,
  describeBranchSet,
  isUncertaintyType,
  parseUncertainty,
  resolveOptions,
  type BranchSetFilters,
  type LogicTreeOptions,
  type UncertaintyNode,
} from '@faultbranch/core';

export interface NodeDocument {
  tag: string;
  text?: string;
  line?: number;
  attrib?: Record<string, string | number>;
  nodes?: NodeDocument[];
}

export interface BranchDocument {
  branchId: string;
  weight: number;
  line?: number;
  uncertaintyModel: string | number | NodeDocument;
  branchSet?: BranchSetDocument;
}

export interface BranchSetDocument {
  id?: string;
  uncertaintyType: string;
  line?: number;
  collapsed?: boolean;
  filters?: BranchSetFilters;
  branches: BranchDocument[];
}

export interface TreeDocument {
  filename?: string;
  branchSet: BranchSetDocument;
}

export interface LoadedTree {
  root: BranchSet;
  /** Name used in error messages */
  filename: string;
}

let validator: ValidateFunction<TreeDocument> | undefined;

function treeValidator(): ValidateFunction<TreeDocument> {
  if (!validator) {
    const ajv = new Ajv({ allErrors: true, allowUnionTypes: true });
    validator = ajv.compile<TreeDocument>(logicTreeSchema);
  }
  return validator;
}

function formatSchemaErrors(
  errors: ErrorObject[] | null | undefined
): string {
  return (errors ?? [])
    .map((error) => `${error.instancePath || '/'} ${error.message ?? ''}`)
    .join('; ');
}

export function validateTreeDocument(
  input: unknown,
  filename: string
): TreeDocument {
  const validate = treeValidator();
  if (!validate(input)) {
    throw new LogicTreeError(
      undefined,
      filename,
      `document does not match the logic tree schema: ${formatSchemaErrors(validate.errors)}`
    );
  }
  return input;
}

function toNode(doc: NodeDocument): UncertaintyNode {
  return {
    tag: doc.tag,
    text: doc.text,
    attrib: doc.attrib,
    nodes: doc.nodes?.map(toNode),
    lineno: doc.line,
  };
}

function modelNode(branch: BranchDocument): UncertaintyNode {
  const model = branch.uncertaintyModel;
  if (typeof model === 'object') {
    return toNode({ ...model, line: model.line ?? branch.line });
  }
  return { tag: 'uncertaintyModel', text: String(model), lineno: branch.line };
}

class TreeBuilder {
  readonly lines = new Map<BranchSet, number | undefined>();

  constructor(
    private readonly filename: string,
    private readonly maxDepth: number
  ) {}

  build(doc: BranchSetDocument, depth: number): BranchSet {
    if (depth >= this.maxDepth) {
      throw new LogicTreeError(
        doc.line,
        this.filename,
        `logic tree is deeper than guards.maxDepth (${this.maxDepth})`
      );
    }
    const { uncertaintyType } = doc;
    if (!isUncertaintyType(uncertaintyType)) {
      throw new LogicTreeError(
        doc.line,
        this.filename,
        `unknown uncertainty type '${uncertaintyType}'`
      );
    }

    const seen = new Set<string>();
    const branches = doc.branches.map((branchDoc) => {
      if (seen.has(branchDoc.branchId)) {
        throw new LogicTreeError(
          branchDoc.line,
          this.filename,
          `duplicate branchId '${branchDoc.branchId}'`
        );
      }
      seen.add(branchDoc.branchId);
      return new Branch({
        bsId: doc.id ?? '',
        branchId: branchDoc.branchId,
        weight: branchDoc.weight,
        value: parseUncertainty(
          uncertaintyType,
          modelNode(branchDoc),
          this.filename
        ),
        bset: branchDoc.branchSet && this.build(branchDoc.branchSet, depth + 1),
      });
    });

    let bset: BranchSet;
    try {
      bset = new BranchSet({
        id: doc.id,
        uncertaintyType,
        filters: doc.filters,
        collapsed: doc.collapsed,
        branches,
      });
    } catch (error) {
      if (error instanceof ContractViolationError) {
        throw new LogicTreeError(doc.line, this.filename, error.message, error);
      }
      throw error;
    }
    this.lines.set(bset, doc.line);
    return bset;
  }
}

/**
 * Builds the tree of a validated document and rejects branch sets whose
 * weights do not sum to 1 within `weights.tolerance`.
 */
export function buildTree(
  doc: TreeDocument,
  filename: string,
  options: LogicTreeOptions = {}
): BranchSet {
  const { guards, weights } = resolveOptions(options);
  const builder = new TreeBuilder(filename, guards.maxDepth);
  const root = builder.build(doc.branchSet, 0);

  const [mismatch] = checkWeights(root, weights.tolerance);
  if (mismatch) {
    throw new LogicTreeError(
      builder.lines.get(mismatch.bset),
      filename,
      `branch weights of ${describeBranchSet(mismatch.bset)} sum to ${mismatch.sum}, expected 1`
    );
  }
  return root;
}

export function parseTreeDocument(
  raw: string,
  filename: string,
  options: LogicTreeOptions = {}
): LoadedTree {
  let input: unknown;
  try {
    input = JSON.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new LogicTreeError(undefined, filename, `invalid JSON: ${message}`);
  }
  const doc = validateTreeDocument(input, filename);
  const name = doc.filename ?? filename;
  return { root: buildTree(doc, name, options), filename: name };
}

/**
 * Reads and builds the tree stored at `treePath` (relative to `cwd`)
 */
export function loadTreeFile(
  treePath: string,
  options: LogicTreeOptions = {},
  cwd: string = process.cwd()
): LoadedTree {
  const abs = path.resolve(cwd, treePath);
  if (!fs.existsSync(abs)) {
    throw new ConfigError(`Tree file not found: ${abs}`, 'tree');
  }
  return parseTreeDocument(fs.readFileSync(abs, 'utf8'), treePath, options);
}
