import { test, expect } from '@playwright/test';

import {
  findWithStrategies,
  headingAlongFramePath,
  headingInAnyFrame,
  PREVIEW_FRAME_PATH,
  webControlInWorkspaceFrame,
  type LookupStrategy
} from '../../src/readiness/strategies';
import { fail } from '../../src/result';
import { FakeElement, FakePage, FakeScope } from '../support/fake-browser';
import { fakeWorkspace, frameWithHeading } from '../support/workspace';

test.describe('Web control strategy', () => {
  test('returns the exact-text control inside the workspace frame', async () => {
    const { page, webControl } = fakeWorkspace();

    const found = await webControlInWorkspaceFrame().find(page);

    expect(found.ok).toBe(true);
    expect(found.ok && found.value).toBe(webControl);
  });

  test('reports a lookup failure when the workspace frame is missing', async () => {
    const found = await webControlInWorkspaceFrame().find(new FakePage());

    expect(found.ok).toBe(false);
    expect(!found.ok && found.failure.stage).toBe('lookup');
    expect(!found.ok && found.failure.step).toBe('find workspace frame');
  });
});

test.describe('Preview frame path strategy', () => {
  test('names the frame level that was missing', async () => {
    const { page } = fakeWorkspace();
    const workspaceFrame = page.locator(PREVIEW_FRAME_PATH[0]).contentFrame();
    const innerFrame = workspaceFrame.locator(PREVIEW_FRAME_PATH[1]).contentFrame();
    innerFrame.selectors.delete(PREVIEW_FRAME_PATH[2]);

    const found = await headingAlongFramePath().find(page);

    expect(found.ok).toBe(false);
    expect(!found.ok && found.failure.step).toBe('find frame iframe[title="Web"]');
  });

  test('fails when the heading exists but is not visible', async () => {
    const { page } = fakeWorkspace({ headingVisible: false });

    const found = await headingAlongFramePath().find(page);

    expect(!found.ok && found.failure.step).toBe('find "Starting server" heading in preview frame');
  });
});

test.describe('Frame scan strategy', () => {
  test('treats a page with no frames as not found', async () => {
    const found = await headingInAnyFrame().find(new FakePage());

    expect(found.ok).toBe(false);
    expect(!found.ok && found.failure.message).toBe('not visible in any of 0 frames');
  });

  test('finds the heading in whichever frame shows it', async () => {
    const page = new FakePage();
    const hidden = new FakeScope().withRole('heading', 'Starting server', new FakeElement({ visible: false }));
    const shown = frameWithHeading();
    page.attachedFrames = [new FakeScope(), hidden, shown];

    const found = await headingInAnyFrame().find(page);

    expect(found.ok && found.value).toBe(shown.getByRole('heading', { name: 'Starting server' }));
  });
});

test.describe('findWithStrategies', () => {
  const failing = (name: string): LookupStrategy => ({
    name,
    async find() {
      return fail('lookup', name, 'not here');
    }
  });

  test('falls through to the next strategy', async () => {
    const element = new FakeElement();
    const found = await findWithStrategies(new FakePage(), [
      failing('first'),
      { name: 'second', find: async () => ({ ok: true, value: element }) }
    ]);

    expect(found.ok && found.value).toBe(element);
  });

  test('treats a strategy that throws as a miss', async () => {
    const element = new FakeElement();
    const found = await findWithStrategies(new FakePage(), [
      {
        name: 'detached',
        find: async () => {
          throw new Error('frame detached');
        }
      },
      { name: 'second', find: async () => ({ ok: true, value: element }) }
    ]);

    expect(found.ok && found.value).toBe(element);
  });

  test('reports a thrown error as a lookup failure of that strategy', async () => {
    const found = await findWithStrategies(new FakePage(), [
      {
        name: 'detached',
        find: async () => {
          throw new Error('frame detached');
        }
      }
    ]);

    expect(!found.ok && found.failure).toMatchObject({ stage: 'lookup', step: 'detached', message: 'frame detached' });
  });

  test('returns the last failure when every strategy misses', async () => {
    const found = await findWithStrategies(new FakePage(), [failing('first'), failing('second')]);

    expect(!found.ok && found.failure.step).toBe('second');
  });

  test('fails without strategies', async () => {
    const found = await findWithStrategies(new FakePage(), []);

    expect(!found.ok && found.failure.message).toBe('no lookup strategies configured');
  });
});
