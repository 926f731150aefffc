import { PREVIEW_FRAME_PATH, STARTING_SERVER_HEADING, WEB_CONTROL_LABEL } from '../../src/readiness/strategies';
import { FakeClock, FakeElement, FakePage, FakeScope } from './fake-browser';

export interface FakeWorkspace {
  page: FakePage;
  clock: FakeClock;
  webControl: FakeElement;
  previewHeading: FakeElement;
}

/**
 * A page with the workspace iframe chain wired up:
 * workspace frame -> inner frame -> "Web" frame -> preview frame.
 */
export function fakeWorkspace(
  options: { webControl?: FakeElement; headingVisible?: boolean } = {}
): FakeWorkspace {
  const clock = new FakeClock();
  const page = new FakePage(clock);
  const webControl = options.webControl ?? new FakeElement();
  const previewHeading = new FakeElement({ visible: options.headingVisible ?? true });

  // Build from the innermost frame outwards.
  let scope = new FakeScope().withRole('heading', STARTING_SERVER_HEADING, previewHeading);
  for (let level = PREVIEW_FRAME_PATH.length - 1; level >= 1; level--) {
    scope = new FakeScope().withSelector(PREVIEW_FRAME_PATH[level], new FakeElement({ frame: scope }));
  }
  scope.withText(WEB_CONTROL_LABEL, webControl);
  page.withSelector(PREVIEW_FRAME_PATH[0], new FakeElement({ frame: scope }));

  return { page, clock, webControl, previewHeading };
}

/** A frame with nothing but a visible "Starting server" heading */
export function frameWithHeading(): FakeScope {
  return new FakeScope().withRole('heading', STARTING_SERVER_HEADING, new FakeElement());
}
