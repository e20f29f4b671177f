// backend/services/user-managing/src/repo/userRepo.ts

/**
 * Persistence for user profiles. Rows live in Supabase (`users_data`); all
 * access goes through pg_graphql, never a direct Postgres connection.
 */

import type { SupabaseGraphqlClient } from "../clients/SupabaseGraphqlClient";
import {
  zUpdateUserResult,
  zUserCollection,
  type UpdatedUser,
  type User,
  type UserUpdate,
} from "../contracts/user.contract";

export const GET_USER_BY_ID = `
  query GetUserById($id: UUID!) {
    users_dataCollection(filter: { id: { eq: $id } }) {
      edges {
        node {
          first_name
          last_name
          id
          email
          created_at
          latitude
          longitude
          location
        }
      }
    }
  }
`;

export const UPDATE_USER = `
  mutation UpdateUser($id: UUID!, $set: users_dataUpdateInput!) {
    updateusers_dataCollection(
      filter: { id: { eq: $id } }
      set: $set
      atMost: 1
    ) {
      records {
        first_name
        last_name
        location
        longitude
        latitude
      }
    }
  }
`;

export interface IUserRepo {
  findById(id: string, requestId?: string): Promise<User | null>;
  updateById(
    id: string,
    patch: UserUpdate,
    requestId?: string
  ): Promise<UpdatedUser | null>;
}

export class UserRepo implements IUserRepo {
  constructor(private readonly gql: SupabaseGraphqlClient) {}

  public async findById(id: string, requestId?: string): Promise<User | null> {
    const data = await this.gql.request(GET_USER_BY_ID, { id }, zUserCollection, {
      requestId,
      operation: "GetUserById",
    });
    return data.users_dataCollection.edges[0]?.node ?? null;
  }

  /** Returns null when no row matched the id. */
  public async updateById(
    id: string,
    patch: UserUpdate,
    requestId?: string
  ): Promise<UpdatedUser | null> {
    const data = await this.gql.request(
      UPDATE_USER,
      { id, set: patch },
      zUpdateUserResult,
      { requestId, operation: "UpdateUser" }
    );
    return data.updateusers_dataCollection.records[0] ?? null;
  }
}
