import type { ChatClient, ChatRequest } from '../src/ChatClient.js';

type Reply = string | null | Error;

/** Chat client answering from a queue; the last reply repeats once the queue runs dry. */
export class FakeChatClient implements ChatClient {
  readonly requests: ChatRequest[] = [];
  private readonly replies: Reply[];

  constructor(...replies: Reply[]) {
    this.replies = replies;
  }

  complete(request: ChatRequest): Promise<string | null> {
    this.requests.push(request);
    const reply = this.replies.length > 1 ? this.replies.shift() : this.replies[0];
    if (reply === undefined) return Promise.resolve(null);
    if (reply instanceof Error) return Promise.reject(reply);
    return Promise.resolve(reply);
  }
}

export function customerReply(overrides: Record<string, unknown> = {}): string {
  return JSON.stringify({
    normalized_attributes: {
      Email: { field_name: 'email', data_type: 'string', description: 'Contact email', is_required: true },
      'Full Name': { field_name: 'full name', data_type: 'String', description: 'Name' },
      'Signup Date': { field_name: 'signup_date', data_type: 'date', description: '', is_required: false },
    },
    suggested_indexes: [
      { field_names: ['email'], index_type: 'unique', reason: 'Identifier' },
      { field_names: 'Signup Date', index_type: 'descending', reason: 'Recent first' },
      { field_names: ['email', 'signup_date'], index_type: 'ascending', reason: 'Compound' },
      { field_names: ['phone'], index_type: 'ascending', reason: 'Lookup' },
    ],
    duplicate_detection_columns: ['Email', 'email', 'phone'],
    collection_name: 'Customer Records',
    ...overrides,
  });
}

export const customerLabels = ['Email', 'Full Name', 'Signup Date'];
