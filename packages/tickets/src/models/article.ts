import type { Knex } from 'knex';
import type { IArticle } from '@deskflow/types';

export interface CreateArticleInput {
  ticketId: number;
  body: string;
  visibleForCustomer: boolean;
  actorId: number;
  createTime: string;
}

function insertedId(value: unknown): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'object' && value !== null && 'id' in value) {
    return Number(value.id);
  }
  throw new Error('Article insert did not return an id');
}

const Article = {
  create: async (knexOrTrx: Knex | Knex.Transaction, input: CreateArticleInput): Promise<number> => {
    const [inserted] = await knexOrTrx<IArticle>('article')
      .insert({
        ticket_id: input.ticketId,
        body: input.body,
        is_visible_for_customer: input.visibleForCustomer ? 1 : 0,
        create_time: input.createTime,
        create_by: input.actorId,
      })
      .returning('id');
    return insertedId(inserted);
  },
};

export default Article;
