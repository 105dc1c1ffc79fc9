#!/usr/bin/env node
/**
 * Simple counter example using @tessera/tui
 *
 * Counts up on every tick and redraws; only the digits that change are
 * written to the terminal.
 */

import { Line, Program, Span, every, quit, rect, type Init, type Update, type View } from '../src/index.js';

// Define the model (application state)
interface Model {
  count: number;
}

// Define messages (events)
type Msg = { type: 'increment' };

const increment = every<Msg>(500, () => ({ type: 'increment' }));

// Initialize the model
const init: Init<Model, Msg> = () => {
  return [{ count: 0 }, increment];
};

// Update function - handles state changes
const update: Update<Model, Msg> = (model, msg) => {
  switch (msg.type) {
    case 'increment':
      if (model.count >= 20) {
        return [model, quit()];
      }
      return [{ count: model.count + 1 }, increment];

    default:
      return [model];
  }
};

// View function - draws the UI
const view: View<Model> = (model, frame) => {
  const area = frame.size();
  frame.renderWidget(
    new Line([Span.styled('Count: ', { bold: true }), Span.raw(model.count.toString().padStart(4))]),
    rect(area.x + 2, area.y + 1, area.width - 4, 1)
  );
  frame.renderWidget('Stops at 20, Ctrl+C to quit early', rect(area.x + 2, area.y + 3, area.width - 4, 1));
};

// Create and run the program
const program = new Program(init, update, view, { altScreen: true });
await program.run();
