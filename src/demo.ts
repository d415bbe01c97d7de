import { parseSyncConfig } from './config.js';
import type { Logger } from './log.js';
import type { PlannerPage, PropertyValue } from './model.js';
import { createContext } from './context.js';
import { MemoryPlanner, MemoryTaskManager } from './providers/memory.js';
import { plannerBindings } from './providers/provider.js';
import { Orchestrator, type SweepReport } from './sync/orchestrator.js';
import type { SyncOutcome } from './sync/engine.js';
import type { SyncStateRecord } from './store/syncStateStore.js';

export const DEMO_CONFIG = parseSyncConfig({
  fieldMapping: { Name: 'content', Due: 'due_date', Priority: 'priority', Area: 'project', Tags: 'labels' },
  descriptionFields: { enabled: true, fields: [{ name: 'Notes' }, { name: 'Estimate', format: 'Estimate: {value} min' }] },
  completionField: { name: 'Status' },
  parentTaskField: { name: 'Parent', titleField: 'Name', createParent: true },
});

export interface DemoReport {
  sweep: SweepReport;
  followUp: SyncOutcome[];
  states: SyncStateRecord[];
}

const EDITED = '2024-01-05T11:00:00.000Z';

function page(id: string, properties: Record<string, PropertyValue>): PlannerPage {
  return { id, properties, createdTime: EDITED, lastEditedTime: EDITED, archived: false };
}

const title = (text: string): PropertyValue => ({ type: 'title', text });
const status = (name: string): PropertyValue => ({ type: 'status', name });

/**
 * In-memory round trip: sweep the planner into the task manager, then edit
 * a task on the task-manager side and reconcile it back.
 */
export async function runDemo(stateDir: string, logger: Logger): Promise<DemoReport> {
  let clock = Date.parse('2024-01-05T12:00:00.000Z');
  const now = () => new Date((clock += 1000));

  const planner = new MemoryPlanner(plannerBindings(DEMO_CONFIG), { now });
  const tasks = new MemoryTaskManager({ now });
  tasks.addProject('Home');
  tasks.addLabel('errands');

  planner.put(
    page('milk', {
      Name: title('Buy milk'),
      Due: { type: 'date', start: '2024-01-10', end: null },
      Priority: { type: 'select', name: '1' },
      Area: { type: 'select', name: 'Home' },
      Tags: { type: 'multi_select', names: ['errands'] },
      Notes: { type: 'rich_text', text: 'Oat, not dairy' },
      Status: status('Not started'),
    }),
  );
  planner.put(page('trip', { Name: title('Plan trip'), Status: status('Not started') }));
  planner.put(
    page('flights', {
      Name: title('Book flights'),
      Parent: { type: 'relation', ids: ['trip'] },
      Estimate: { type: 'number', value: 30 },
      Status: status('Not started'),
    }),
  );
  planner.put(
    page('hotel', { Name: title('Reserve hotel'), Parent: { type: 'relation', ids: ['trip'] }, Status: status('Not started') }),
  );
  planner.put(page('taxes', { Name: title('File taxes'), Status: status('Done') }));

  const ctx = createContext({ env: {}, config: DEMO_CONFIG, logger, stateDir, planner, tasks, now });
  const orchestrator = new Orchestrator(ctx, { now });

  const sweep = await orchestrator.runFullSweep(120);

  const followUp: SyncOutcome[] = [];
  const milk = await ctx.store.getByA('milk');
  if (milk) {
    await tasks.update(milk.sideBId, { content: 'Buy oat milk' });
    followUp.push(await orchestrator.engine.syncFromB(milk.sideBId));
    await tasks.complete(milk.sideBId);
    followUp.push(await orchestrator.engine.syncFromB(milk.sideBId));
  }

  return { sweep, followUp, states: await ctx.store.listAll() };
}
