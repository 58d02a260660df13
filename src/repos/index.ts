import { BetterSqliteDb } from '../db/sqlite';
import { ChatModesRepo } from './chat-modes-repo';
import { DedupMarkersRepo } from './dedup-markers-repo';
import { ModerationActionsRepo } from './moderation-actions-repo';
import { RestrictionsRepo } from './restrictions-repo';
import { StrikesRepo } from './strikes-repo';
import { UserListsRepo } from './user-lists-repo';

export interface Repositories {
  chatModes: ChatModesRepo;
  dedupMarkers: DedupMarkersRepo;
  moderationActions: ModerationActionsRepo;
  restrictions: RestrictionsRepo;
  strikes: StrikesRepo;
  userLists: UserListsRepo;
}

export function createRepositories(db: BetterSqliteDb): Repositories {
  return {
    chatModes: new ChatModesRepo(db),
    dedupMarkers: new DedupMarkersRepo(db),
    moderationActions: new ModerationActionsRepo(db),
    restrictions: new RestrictionsRepo(db),
    strikes: new StrikesRepo(db),
    userLists: new UserListsRepo(db),
  };
}
