/**
 * Thresholds for the consensus step functions.
 */

export interface ConsensusThresholds {
  /** Close within this fraction of the 52-week high earns the breakout points. */
  nearHighPct: number;
  /** CNY */
  northboundNetInflowMin: number;
  /** CNY */
  marginNetBuyMin: number;
  analystBuyCountMin: number;
  sectorHeatTopN: number;
  discussionVolumeHigh: number;
  discussionVolumeLow: number;
}

export const DEFAULT_CONSENSUS_THRESHOLDS: ConsensusThresholds = {
  nearHighPct: 0.05,
  northboundNetInflowMin: 50_000_000,
  marginNetBuyMin: 10_000_000,
  analystBuyCountMin: 5,
  sectorHeatTopN: 10,
  discussionVolumeHigh: 10_000,
  discussionVolumeLow: 3_000,
};

