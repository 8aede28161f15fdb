import { describe, it, expect } from 'vitest';
import { buildWorkspaceHeaders, toRemoteEnvelope, tokenPreview } from '../providers/mcpWorkspace';

const textResult = (text: string, isError?: boolean) => ({
  content: [{ type: 'text', text }],
  ...(isError === undefined ? {} : { isError }),
});

describe('toRemoteEnvelope', () => {
  it('lifts the page url out of a successful result', () => {
    const envelope = toRemoteEnvelope(
      textResult('{"object":"page","id":"page-1","url":"https://workspace.example/page-1"}')
    );

    expect(envelope).toEqual({
      ok: true,
      url: 'https://workspace.example/page-1',
      data: { object: 'page', id: 'page-1', url: 'https://workspace.example/page-1' },
    });
  });

  it('treats an error object in the body as a failure', () => {
    const envelope = toRemoteEnvelope(
      textResult('{"object":"error","status":400,"code":"validation_error","message":"Due is not a property that exists."}')
    );

    expect(envelope).toEqual({ ok: false, message: 'Due is not a property that exists.' });
  });

  it('treats isError results as failures carrying their text', () => {
    expect(toRemoteEnvelope(textResult('MCP error -32603: upstream unavailable', true))).toEqual({
      ok: false,
      message: 'MCP error -32603: upstream unavailable',
    });
  });

  it('accepts a plain-text success', () => {
    expect(toRemoteEnvelope(textResult('Created.'))).toEqual({ ok: true, url: undefined, data: 'Created.' });
  });

  it('rejects a result of the wrong shape', () => {
    expect(toRemoteEnvelope({ content: 'not a list' })).toEqual({ ok: false, message: 'Malformed tool result' });
  });
});

describe('workspace credentials', () => {
  it('builds the tool server headers', () => {
    expect(buildWorkspaceHeaders('test-secret')).toBe(
      '{"Authorization":"Bearer test-secret","Notion-Version":"2022-06-28"}'
    );
  });

  it('previews only the first ten characters of the token', () => {
    expect(tokenPreview('secret_placeholder')).toBe('secret_pla...');
  });
});
