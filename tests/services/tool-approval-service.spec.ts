import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../../src/utils/logger.js', () => ({
  logThought: vi.fn().mockResolvedValue(undefined),
}));

import { createConnectorTool, createToolCall } from '../../src/core/tool-model.js';
import { SessionApprovalMemory } from '../../src/services/approval-memory.js';
import {
  ToolApprovalService,
  shellCommandOf,
  type ApprovalPrompt,
  type ApprovalPromptResponse,
  type ApprovalRequest,
} from '../../src/services/tool-approval-service.js';
import type { ToolCall } from '../../src/types/tools.js';

const shellTool = createConnectorTool({
  originalName: 'execute',
  connectorId: 'shell',
  connectorName: 'System Commands',
});
const notesTool = createConnectorTool({ originalName: 'search', connectorId: 'notes', connectorName: 'Notes' });

const shellCall = (command: string, id: string): ToolCall => createToolCall(shellTool, { command }, id);

function scriptedPrompt(answer: (requests: ApprovalRequest[]) => ApprovalPromptResponse) {
  const seen: ApprovalRequest[][] = [];
  const prompt: ApprovalPrompt = {
    requestApproval: async (requests) => {
      seen.push(requests);
      return answer(requests);
    },
  };
  return { prompt, seen };
}

describe('ToolApprovalService', () => {
  let memory: SessionApprovalMemory;

  beforeEach(() => {
    vi.clearAllMocks();
    memory = new SessionApprovalMemory('s1');
  });

  it('reads the command only from shell execute calls', () => {
    expect(shellCommandOf(shellCall('ls', 'c1'))).toBe('ls');
    expect(shellCommandOf(createToolCall(notesTool, { command: 'ls' }, 'c2'))).toBeUndefined();
    expect(shellCommandOf(createToolCall(shellTool, { command: 42 }, 'c3'))).toBeUndefined();
  });

  it('denies every pending call when no prompt is configured', async () => {
    const service = new ToolApprovalService();

    const outcome = await service.requestApproval([shellCall('ls', 'c1')], { memory });

    expect(outcome.allApproved).toBe(false);
    expect(outcome.approved).toEqual([]);
    expect(outcome.denied.map((entry) => entry.reason)).toEqual(['No approval handler available']);
    expect(outcome.records[0].source).toBe('no_handler');
  });

  it('passes remembered calls through without asking', async () => {
    const { prompt, seen } = scriptedPrompt(() => ({ decisions: [] }));
    const service = new ToolApprovalService({ prompt });
    memory.rememberShellPattern('ls *');
    memory.approveTool('notes_search');

    const outcome = await service.requestApproval(
      [shellCall('ls -la', 'c1'), createToolCall(notesTool, { query: 'x' }, 'c2')],
      { memory },
    );

    expect(outcome.allApproved).toBe(true);
    expect(outcome.records.map((record) => record.source)).toEqual(['memory', 'memory']);
    expect(seen).toEqual([]);
  });

  it('asks again for a command whose later lines the memory does not cover', async () => {
    const { prompt, seen } = scriptedPrompt(() => ({ decisions: [], allowAllOnce: true }));
    const service = new ToolApprovalService({ prompt });
    memory.rememberShellPattern('df *');

    const outcome = await service.requestApproval([shellCall('df\nrm -rf /', 'c1')], { memory });

    expect(outcome.allApproved).toBe(false);
    expect(outcome.denied.map((entry) => entry.reason)).toEqual(['No decision received']);
    expect(outcome.records.map((record) => record.source)).toEqual(['user']);
    expect(seen[0][0].requiresExplicitApproval).toBe(true);
  });

  it('describes shell calls to the prompt', async () => {
    const { prompt, seen } = scriptedPrompt(() => ({ decisions: [] }));
    const service = new ToolApprovalService({ prompt });
    const call = shellCall('rm -rf build', 'c1');

    await service.requestApproval([call], { memory });

    expect(seen[0]).toEqual([
      {
        call,
        command: 'rm -rf build',
        riskLevel: 'destructive',
        requiresExplicitApproval: true,
        suggestedPattern: 'rm -rf build',
      },
    ]);
  });

  it('remembers a session approval as a wildcard pattern', async () => {
    const { prompt, seen } = scriptedPrompt((requests) => ({
      decisions: requests.map((request) => ({ callId: request.call.id, approved: true, rememberForSession: true })),
    }));
    const service = new ToolApprovalService({ prompt });

    await service.requestApproval([shellCall('ls -la', 'c1')], { memory });
    const second = await service.requestApproval([shellCall('ls /tmp', 'c2')], { memory });

    expect(memory.snapshot().shellPatterns).toEqual(['ls *']);
    expect(second.records[0].source).toBe('memory');
    expect(seen).toHaveLength(1);
  });

  it('never remembers commands that need explicit approval', async () => {
    const { prompt, seen } = scriptedPrompt((requests) => ({
      decisions: requests.map((request) => ({ callId: request.call.id, approved: true, rememberForSession: true })),
    }));
    const service = new ToolApprovalService({ prompt });

    await service.requestApproval([shellCall('rm -rf build', 'c1')], { memory });
    await service.requestApproval([shellCall('rm -rf build', 'c2')], { memory });

    expect(memory.shellPatternCount).toBe(0);
    expect(seen).toHaveLength(2);
  });

  it('remembers non-shell tools by name', async () => {
    const { prompt } = scriptedPrompt(() => ({
      decisions: [{ callId: 'c1', approved: true, rememberForSession: true }],
    }));
    const service = new ToolApprovalService({ prompt });

    await service.requestApproval([createToolCall(notesTool, {}, 'c1')], { memory });

    expect(memory.isToolApproved('notes_search')).toBe(true);
  });

  it('lets allow-all-once skip only calls without explicit approval', async () => {
    const { prompt } = scriptedPrompt(() => ({ decisions: [], allowAllOnce: true }));
    const service = new ToolApprovalService({ prompt });

    const removal = shellCall('rm notes.txt', 'c2');

    const outcome = await service.requestApproval([shellCall('ls', 'c1'), removal], { memory });

    expect(outcome.approved.map((call) => call.id)).toEqual(['c1']);
    expect(outcome.denied).toEqual([{ call: removal, reason: 'No decision received' }]);
    expect(outcome.records.map((record) => record.source)).toEqual(['allow_all_once', 'user']);
    expect(memory.shellPatternCount).toBe(0);
  });

  it('uses the reason given with a denial', async () => {
    const { prompt } = scriptedPrompt(() => ({
      decisions: [
        { callId: 'c1', approved: false, reason: 'Too risky' },
        { callId: 'c2', approved: false },
      ],
    }));
    const service = new ToolApprovalService({ prompt });

    const outcome = await service.requestApproval([shellCall('ls', 'c1'), shellCall('pwd', 'c2')], { memory });

    expect(outcome.denied.map((entry) => entry.reason)).toEqual(['Too risky', 'Denied by user']);
  });

  it('denies pending calls when the prompt times out', async () => {
    const prompt: ApprovalPrompt = { requestApproval: () => new Promise<ApprovalPromptResponse>(() => undefined) };
    const service = new ToolApprovalService({ prompt, timeoutMs: 10 });

    const outcome = await service.requestApproval([shellCall('ls', 'c1')], { memory });

    expect(outcome.denied.map((entry) => entry.reason)).toEqual(['Approval timed out']);
    expect(outcome.records[0].source).toBe('timeout');
  });

  it('denies pending calls when cancelled', async () => {
    const { prompt, seen } = scriptedPrompt(() => ({ decisions: [] }));
    const service = new ToolApprovalService({ prompt });
    const controller = new AbortController();
    controller.abort();

    const outcome = await service.requestApproval([shellCall('ls', 'c1')], { memory, signal: controller.signal });

    expect(outcome.denied.map((entry) => entry.reason)).toEqual(['Approval cancelled']);
    expect(seen).toEqual([]);
  });

  it('treats a failing prompt as a cancellation', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const prompt: ApprovalPrompt = { requestApproval: () => Promise.reject(new Error('dialog closed')) };
    const service = new ToolApprovalService({ prompt });

    const outcome = await service.requestApproval([shellCall('ls', 'c1')], { memory });

    expect(outcome.records[0].source).toBe('cancelled');
    expect(errorSpy).toHaveBeenCalledWith('[ToolApprovalService] Approval prompt failed:', 'dialog closed');
  });

  it('keeps a per-session decision history', async () => {
    const service = new ToolApprovalService();

    await service.requestApproval([shellCall('ls', 'c1')], { memory });
    await service.requestApproval([shellCall('pwd', 'c2')], { memory });

    expect(service.decisionsFor('s1').map((record) => record.callId)).toEqual(['c1', 'c2']);
    expect(service.decisionsFor('other')).toEqual([]);

    service.clearSession('s1');
    expect(service.decisionsFor('s1')).toEqual([]);
  });
});
