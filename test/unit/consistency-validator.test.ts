import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { MESSAGE_SPEC_DIAGNOSTIC_CODES } from '../../src/kernel/diagnostic-codes.js';
import { isMessageSpecError } from '../../src/kernel/spec-error.js';
import type { MessageModel } from '../../src/kernel/types.js';
import { parseArtifactProjection, validateConsistency } from '../../src/validate/consistency-validator.js';
import {
  ARTIFACT_KINDS,
  projectApiSchema,
  projectArtifact,
  projectBusinessObject,
  projectWireLayout,
  type ArtifactProjection,
  type ProjectedField,
} from '../../src/validate/projections.js';
import { diagnosticCodes } from '../helpers/diagnostic-helpers.js';
import { buildOrFail, leaf, marker, sheetOf } from '../helpers/spec-row-fixtures.js';

function orderLinesModel(): MessageModel {
  return buildOrFail(
    'request',
    sheetOf('Request', [
      leaf(0, 'Order Id', '10', 'String', { optionality: 'M' }),
      marker(0, 'lines:Line', '0..5'),
      { level: 1, fieldName: 'groupId', description: 'LN' },
      leaf(1, 'Amount', '5', 'Number', { optionality: 'M', hardCodeRule: '0' }),
    ]),
  );
}

const withFields = (projection: ArtifactProjection, fields: readonly ProjectedField[]): ArtifactProjection => ({
  artifact: projection.artifact,
  fields,
});

/** Fills every artifact kind the test does not tamper with from the model itself. */
const withCanonical = (model: MessageModel, projections: readonly ArtifactProjection[]): ArtifactProjection[] => [
  ...projections,
  ...ARTIFACT_KINDS.filter((artifact) => !projections.some((projection) => projection.artifact === artifact)).map(
    (artifact) => projectArtifact(model, artifact),
  ),
];

describe('artifact projections', () => {
  it('keeps transitory metadata only in the wire layout', () => {
    const model = orderLinesModel();

    assert.deepEqual(projectWireLayout(model).fields, [
      { path: 'orderId', type: 'String', required: true },
      { path: 'lines', type: 'Line[]', required: false },
      { path: 'lines.groupId', type: 'String', required: false, defaultValue: 'LN' },
      { path: 'lines.amount', type: 'Number', required: true, defaultValue: '0' },
    ]);
    assert.deepEqual(
      projectBusinessObject(model).fields.map((field) => field.path),
      ['orderId', 'lines', 'lines.amount'],
    );
    assert.deepEqual(projectApiSchema(model).fields, projectBusinessObject(model).fields);
  });
});

describe('validateConsistency', () => {
  it('passes when every artifact matches its projection', () => {
    const model = orderLinesModel();
    const result = validateConsistency(model, [
      projectWireLayout(model),
      projectBusinessObject(model),
      projectApiSchema(model),
    ]);
    assert.deepEqual(result.issues, []);
  });

  it('reports every canonical field of an artifact that was not supplied', () => {
    const model = orderLinesModel();
    const result = validateConsistency(model, [projectWireLayout(model), projectBusinessObject(model)]);

    assert.equal(result.success, false);
    assert.deepEqual(
      result.issues.map((issue) => [issue.code, issue.artifact, issue.path]),
      [
        [MESSAGE_SPEC_DIAGNOSTIC_CODES.MISSING_IN_ARTIFACT, 'apiSchema', 'orderId'],
        [MESSAGE_SPEC_DIAGNOSTIC_CODES.MISSING_IN_ARTIFACT, 'apiSchema', 'lines'],
        [MESSAGE_SPEC_DIAGNOSTIC_CODES.MISSING_IN_ARTIFACT, 'apiSchema', 'lines.amount'],
      ],
    );
  });

  it('expects all three artifacts when none are supplied', () => {
    const model = orderLinesModel();
    const result = validateConsistency(model, []);

    assert.deepEqual(
      result.issues.map((issue) => `${issue.artifact ?? ''}:${issue.path}`),
      [
        'wireLayout:orderId',
        'wireLayout:lines',
        'wireLayout:lines.groupId',
        'wireLayout:lines.amount',
        'businessObject:orderId',
        'businessObject:lines',
        'businessObject:lines.amount',
        'apiSchema:orderId',
        'apiSchema:lines',
        'apiSchema:lines.amount',
      ],
    );
    assert.deepEqual(new Set(diagnosticCodes(result.issues)), new Set([MESSAGE_SPEC_DIAGNOSTIC_CODES.MISSING_IN_ARTIFACT]));
  });

  it('reports one mismatch per divergent attribute', () => {
    const model = orderLinesModel();
    const api = projectApiSchema(model);
    const artifact = withFields(
      api,
      api.fields.map((field) =>
        field.path === 'lines.amount' ? { path: field.path, type: 'Decimal', required: false, defaultValue: '0' } : field,
      ),
    );
    const result = validateConsistency(model, withCanonical(model, [artifact]));

    assert.deepEqual(
      result.issues.map((issue) => [issue.code, issue.artifact, issue.path, issue.expected, issue.actual]),
      [
        [MESSAGE_SPEC_DIAGNOSTIC_CODES.ATTRIBUTE_MISMATCH, 'apiSchema', 'lines.amount', 'Number', 'Decimal'],
        [MESSAGE_SPEC_DIAGNOSTIC_CODES.ATTRIBUTE_MISMATCH, 'apiSchema', 'lines.amount', 'true', 'false'],
      ],
    );
  });

  it('compares defaults including their absence', () => {
    const model = orderLinesModel();
    const business = projectBusinessObject(model);
    const artifact = withFields(
      business,
      business.fields.map((field) => (field.path === 'lines.amount' ? { path: field.path, type: 'Number', required: true } : field)),
    );
    const result = validateConsistency(model, withCanonical(model, [artifact]));

    assert.deepEqual(
      result.issues.map((issue) => [issue.expected, issue.actual]),
      [['"0"', '(none)']],
    );
  });

  it('translates canonical types through artifact type mappers', () => {
    const model = orderLinesModel();
    const lowerCased = projectApiSchema(model);
    const projections = withCanonical(model, [
      withFields(
        lowerCased,
        lowerCased.fields.map((field) => ({ ...field, type: field.type.toLowerCase() })),
      ),
    ]);

    assert.equal(validateConsistency(model, projections).success, false);
    assert.equal(
      validateConsistency(model, projections, { typeMappers: { apiSchema: (type) => type.toLowerCase() } }).success,
      true,
    );
  });

  it('reports invented and duplicated fields', () => {
    const model = orderLinesModel();
    const business = projectBusinessObject(model);
    const wire = projectWireLayout(model);
    const result = validateConsistency(
      model,
      withCanonical(model, [
        withFields(business, [...business.fields, { path: 'lines.groupId', type: 'String', required: false }]),
        withFields(wire, [...wire.fields, { path: 'orderId', type: 'String', required: true }]),
      ]),
    );

    assert.deepEqual(
      result.issues.map((issue) => `${issue.code}:${issue.artifact ?? ''}:${issue.path}`),
      [
        `${MESSAGE_SPEC_DIAGNOSTIC_CODES.EXTRANEOUS_FIELD}:businessObject:lines.groupId`,
        `${MESSAGE_SPEC_DIAGNOSTIC_CODES.DUPLICATE_ARTIFACT_FIELD}:wireLayout:orderId`,
      ],
    );
  });

  it('checks sibling order only for the wire layout', () => {
    const model = orderLinesModel();
    const reorder = (projection: ArtifactProjection): ArtifactProjection =>
      withFields(projection, [...projection.fields.slice(1), ...projection.fields.slice(0, 1)]);

    const result = validateConsistency(
      model,
      withCanonical(model, [reorder(projectWireLayout(model)), reorder(projectBusinessObject(model))]),
    );

    assert.deepEqual(diagnosticCodes(result.issues), [MESSAGE_SPEC_DIAGNOSTIC_CODES.ORDER_MISMATCH]);
    assert.equal(result.issues[0]?.artifact, 'wireLayout');
    assert.equal(result.issues[0]?.path, '<root>');
    assert.equal(result.issues[0]?.expected, 'orderId, lines');
    assert.equal(result.issues[0]?.actual, 'lines, orderId');
  });
});

describe('parseArtifactProjection', () => {
  it('accepts renderer output and rejects malformed projections', () => {
    const parsed = parseArtifactProjection({
      artifact: 'apiSchema',
      fields: [{ path: 'orderId', type: 'string', required: true, defaultValue: 'X' }],
    });
    assert.equal(parsed.fields[0]?.defaultValue, 'X');

    assert.throws(
      () => parseArtifactProjection({ artifact: 'pdf', fields: [] }),
      (error: unknown) => isMessageSpecError(error) && error.code === 'ARTIFACT_PROJECTION_INVALID',
    );
  });
});
