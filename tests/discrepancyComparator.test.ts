import OpenAI from 'openai';
import { afterEach, describe, expect, it, vi } from 'vitest';

import { DiscrepancyComparator, parseVerdict } from '@src/services/discrepancyComparator';
import {
  ComparatorResponseMalformedError,
  ComparatorServiceError,
} from '@src/services/errors';
import type { DocumentText, MasterRecord } from '@src/types/validation';
import { completion, fakeClient, noDiscrepancies } from './helpers';

const record: MasterRecord = {
  patientId: '1001',
  rowNumber: 2,
  fields: {
    'Patient ID': '1001',
    Name: 'John Smith',
    'Date of Service': '2024-12-01 00:00:00',
    Insurance: 'BCBS',
  },
};

const document: DocumentText = {
  filename: 'john.pdf',
  text: 'Patient ID: 1001\nName: JOHN SMITH\nDate of Service: 1-Dec-2024\nInsurance: Aetna',
  pageCount: 1,
};

const options = { model: 'gpt-4o-mini', timeoutMs: 1000, promptTextLimit: 3800 };

describe('parseVerdict', () => {
  it('reads the discrepancy list', () => {
    const verdict = parseVerdict(
      '{"discrepancies":[{"field":"Insurance","masterValue":"BCBS","documentValue":"Aetna","explanation":"Different insurers"}]}',
    );

    expect(verdict.discrepancies).toEqual([
      { field: 'Insurance', masterValue: 'BCBS', documentValue: 'Aetna', explanation: 'Different insurers' },
    ]);
  });

  it('strips a markdown fence around the JSON', () => {
    expect(parseVerdict('```json\n{"discrepancies": []}\n```')).toEqual({ discrepancies: [] });
  });

  it('turns numeric and null values into strings', () => {
    const verdict = parseVerdict(
      '{"discrepancies":[{"field":"Amount","masterValue":100,"documentValue":null,"explanation":"Missing"}]}',
    );
    expect(verdict.discrepancies[0]).toEqual({
      field: 'Amount',
      masterValue: '100',
      documentValue: '',
      explanation: 'Missing',
    });
  });

  it('rejects empty, non-JSON and off-schema answers', () => {
    expect(() => parseVerdict('')).toThrow('Model returned an empty response');
    expect(() => parseVerdict('No discrepancies found.')).toThrow(ComparatorResponseMalformedError);
    expect(() => parseVerdict('{"issues": []}')).toThrow(
      'Model response does not match the discrepancy schema (discrepancies: Required)',
    );
  });
});

describe('DiscrepancyComparator', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('sends the document text and master row in JSON mode', async () => {
    const { client, create } = fakeClient(async () => noDiscrepancies());
    const comparator = new DiscrepancyComparator(client, options);

    await comparator.compareRecord(document, record);

    expect(create).toHaveBeenCalledTimes(1);
    const body = create.mock.calls[0]?.[0];
    expect(body?.model).toBe('gpt-4o-mini');
    expect(body?.temperature).toBe(0);
    expect(body?.response_format).toEqual({ type: 'json_object' });

    const user = body?.messages[1];
    expect(user?.role).toBe('user');
    expect(user?.content).toContain('Patient ID: 1001\nName: JOHN SMITH');
    expect(user?.content).toContain('"Insurance": "BCBS"');
  });

  it('reports no discrepancies for a formatting-only pair', async () => {
    const { client } = fakeClient(async () =>
      completion(
        JSON.stringify({
          discrepancies: [
            {
              field: 'Date of Service',
              masterValue: '2024-12-01 00:00:00',
              documentValue: '1-Dec-2024',
              explanation: 'Dates are written differently',
            },
            { field: 'Name', masterValue: 'John Smith', documentValue: 'JOHN SMITH', explanation: 'Case differs' },
          ],
        }),
      ),
    );

    const verdict = await new DiscrepancyComparator(client, options).compareRecord(document, record);

    expect(verdict.discrepancies).toEqual([]);
  });

  it('keeps a genuine insurance mismatch', async () => {
    const insurance = {
      field: 'Insurance',
      masterValue: 'BCBS',
      documentValue: 'Aetna',
      explanation: 'Different insurance companies',
    };
    const { client } = fakeClient(async () => completion(JSON.stringify({ discrepancies: [insurance] })));

    const verdict = await new DiscrepancyComparator(client, options).compareRecord(document, record);

    expect(verdict.discrepancies).toEqual([insurance]);
  });

  it('keeps an amount mismatch whose digits only differ by separators', async () => {
    const amount = {
      field: 'Amount',
      masterValue: '$100.00',
      documentValue: '$10,000',
      explanation: 'Different amounts',
    };
    const { client } = fakeClient(async () => completion(JSON.stringify({ discrepancies: [amount] })));

    const verdict = await new DiscrepancyComparator(client, options).compareRecord(document, record);

    expect(verdict.discrepancies).toEqual([amount]);
  });

  it('fails closed on a malformed answer', async () => {
    const { client } = fakeClient(async () => completion('All the data matches.'));

    await expect(
      new DiscrepancyComparator(client, options).compareRecord(document, record),
    ).rejects.toBeInstanceOf(ComparatorResponseMalformedError);
  });

  it('fails when the model returns no choices', async () => {
    const { client } = fakeClient(async () => ({ choices: [] }));

    await expect(
      new DiscrepancyComparator(client, options).compareRecord(document, record),
    ).rejects.toThrow('Model returned no choices');
  });

  it('times out a call that never answers', async () => {
    vi.useFakeTimers();
    const { client } = fakeClient(() => new Promise(() => undefined));

    const pending = new DiscrepancyComparator(client, { ...options, timeoutMs: 500 })
      .compareRecord(document, record);
    const assertion = expect(pending).rejects.toThrow('Comparison timed out after 500ms');

    await vi.advanceTimersByTimeAsync(500);
    await assertion;
  });

  it('aborts the request when the timeout fires', async () => {
    vi.useFakeTimers();
    let seen: AbortSignal | undefined;
    const { client } = fakeClient((_body, requestOptions) => {
      seen = requestOptions?.signal;
      return new Promise(() => undefined);
    });

    const pending = new DiscrepancyComparator(client, { ...options, timeoutMs: 200 })
      .compareRecord(document, record);
    const assertion = expect(pending).rejects.toBeInstanceOf(ComparatorServiceError);

    await vi.advanceTimersByTimeAsync(200);
    await assertion;
    expect(seen?.aborted).toBe(true);
  });

  it('wraps API errors as service errors with the HTTP status', async () => {
    const { client } = fakeClient(async () => {
      throw new OpenAI.APIError(503, undefined, 'Service Unavailable', undefined);
    });

    const error: unknown = await new DiscrepancyComparator(client, options)
      .compareRecord(document, record)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ComparatorServiceError);
    expect(error).toMatchObject({ status: 503, kind: 'ComparatorServiceError' });
  });

  it('wraps network failures as service errors', async () => {
    const { client } = fakeClient(async () => {
      throw new Error('socket hang up');
    });

    await expect(
      new DiscrepancyComparator(client, options).compareRecord(document, record),
    ).rejects.toThrow('Error during comparison: socket hang up');
  });
});
