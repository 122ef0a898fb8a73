// src/specs/chains.test.ts
import { AIMessage, HumanMessage } from '@langchain/core/messages';
import type * as t from '@/types';
import { FINISH } from '@/common';
import {
  enterChain,
  getLastMessage,
  joinGraph,
  createTeamChain,
  createTeamNode,
} from '@/graphs/chains';
import { createTeamGraph } from '@/graphs/TeamGraph';
import { getMessageText } from '@/messages';

function echoTeam() {
  let turn = 0;
  return createTeamGraph({
    supervisor: async () => ({ next: turn++ === 0 ? 'Echo' : FINISH }),
    members: {
      Echo: async (state: t.TeamState) => ({
        messages: [
          new HumanMessage({
            content: `Echo: ${getLastMessage(state)}`,
            name: 'Echo',
          }),
        ],
      }),
    },
  });
}

describe('chain adapters', () => {
  it('enterChain seeds a single human message', () => {
    const state = enterChain('Summarize the policy');
    expect(state.messages).toHaveLength(1);
    expect(state.messages?.[0]).toBeInstanceOf(HumanMessage);
    expect(getMessageText(state.messages?.[0])).toBe('Summarize the policy');
    expect(state).not.toHaveProperty('team_members');
  });

  it('enterChain adds team members when given', () => {
    expect(enterChain('x', ['DocWriter', 'NoteTaker']).team_members).toEqual([
      'DocWriter',
      'NoteTaker',
    ]);
  });

  it('joinGraph keeps exactly the last of five messages', () => {
    const messages = [
      new HumanMessage('1'),
      new AIMessage('2'),
      new HumanMessage('3'),
      new AIMessage('4'),
      new HumanMessage({ content: '5', name: 'DocWriter' }),
    ];
    const joined = joinGraph({ messages });
    expect(joined.messages).toHaveLength(1);
    expect(joined.messages?.[0]).toBe(messages[4]);
  });

  it('getLastMessage returns the text of the newest message', () => {
    expect(
      getLastMessage({
        messages: [new HumanMessage('old'), new AIMessage('newest')],
      })
    ).toBe('newest');
  });
});

describe('team chains', () => {
  it('runs a team from a plain request string', async () => {
    const chain = createTeamChain(echoTeam(), ['Echo']);

    const state = await chain.invoke('draft a reply');

    expect(state.messages.map(getMessageText)).toEqual([
      'draft a reply',
      'Echo: draft a reply',
    ]);
    expect(state.team_members).toEqual(['Echo']);
  });

  it('collapses a team into one outer worker', async () => {
    const node = createTeamNode(createTeamChain(echoTeam()));

    const update = await node({
      messages: [new HumanMessage('request'), new HumanMessage('task for team')],
      team_members: [],
      next: 'Echo team',
    });

    expect(update.messages).toHaveLength(1);
    expect(getMessageText(update.messages?.[0])).toBe('Echo: task for team');
    expect(update.messages?.[0].name).toBe('Echo');
  });
});
