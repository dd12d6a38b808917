import { beforeEach, describe, expect, it, vi } from 'vitest';

import { GatewayError } from '@/utils/errors';

import { GhCliGateway } from '../gh-cli-gateway';

const { mockExeca } = vi.hoisted(() => ({
  mockExeca: vi.fn(),
}));

vi.mock('execa', () => ({
  execa: mockExeca,
}));

describe('GhCliGateway', () => {
  beforeEach(() => {
    mockExeca.mockReset();
    mockExeca.mockResolvedValue({ stdout: '', stderr: '', exitCode: 0 });
  });

  it('should post the comment body through stdin', async () => {
    const gateway = new GhCliGateway({ cwd: '/work', number: 42 });

    await gateway.submitComment('## JSON Validation Results');

    expect(mockExeca).toHaveBeenCalledWith('gh', ['pr', 'comment', '42', '--body-file', '-'], {
      cwd: '/work',
      timeout: 30_000,
      input: '## JSON Validation Results',
    });
  });

  it('should add the outcome label and remove the opposite one', async () => {
    const gateway = new GhCliGateway({ cwd: '/work', number: 7 });

    await gateway.applyOutcomeLabel('failed');

    expect(mockExeca).toHaveBeenCalledWith(
      'gh',
      [
        'pr',
        'edit',
        '7',
        '--add-label',
        'json-validation-failed',
        '--remove-label',
        'json-validation-passed',
      ],
      { cwd: '/work', timeout: 30_000 },
    );
  });

  it('should target another repository when given', async () => {
    const gateway = new GhCliGateway({ cwd: '/work', number: 3, repo: 'example-org/locales' });

    await gateway.applyOutcomeLabel('passed');

    expect(mockExeca).toHaveBeenCalledWith(
      'gh',
      [
        'pr',
        'edit',
        '3',
        '--add-label',
        'json-validation-passed',
        '--remove-label',
        'json-validation-failed',
        '--repo',
        'example-org/locales',
      ],
      { cwd: '/work', timeout: 30_000 },
    );
  });

  it('should wrap gh failures in a GatewayError', async () => {
    mockExeca.mockRejectedValue(new Error('gh: authentication required'));
    const gateway = new GhCliGateway({ cwd: '/work', number: 42 });

    const error: unknown = await gateway.submitComment('body').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(GatewayError);
    expect(error instanceof Error ? error.message : '').toBe(
      'Pull request comment failed: gh: authentication required',
    );
  });
});
