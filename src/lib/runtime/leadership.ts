/** Only the leader of a replicated group issues certificates. */
export interface LeadershipOracle {
  isLeader(): boolean;
}

export class StaticLeadership implements LeadershipOracle {
  constructor(private leader = true) {}

  isLeader(): boolean {
    return this.leader;
  }

  setLeader(leader: boolean): void {
    this.leader = leader;
  }
}
