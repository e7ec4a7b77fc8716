import { DEFAULT_REVIEWER_NAME } from '../../config/constants.js';

export type GbpStarRating =
  | 'STAR_RATING_UNSPECIFIED'
  | 'ONE'
  | 'TWO'
  | 'THREE'
  | 'FOUR'
  | 'FIVE';

export interface GbpReview {
  name: string; // Resource name: accounts/{id}/locations/{id}/reviews/{id}
  reviewId: string;
  reviewer?: {
    displayName?: string;
    profilePhotoUrl?: string;
    isAnonymous?: boolean;
  };
  starRating: GbpStarRating;
  comment?: string;
  createTime: string;
  updateTime: string;
  reviewReply?: {
    comment: string;
    updateTime: string;
  };
}

export interface GbpReviewsResponse {
  reviews?: GbpReview[];
  averageRating?: number;
  totalReviewCount?: number;
  nextPageToken?: string;
}

/**
 * A review as the reconciliation cycle sees it. Never mutated locally.
 */
export interface Review {
  id: string;
  name: string;
  rating: number;
  body: string;
  authorName: string;
  createdAt: Date;
  updatedAt: Date;
  existingReply?: {
    text: string;
    updatedAt: Date;
  };
}

export interface GbpLocation {
  accountId: string;
  locationId: string;
}

export function starRatingToNumber(rating: GbpStarRating): number {
  const map: Record<GbpStarRating, number> = {
    STAR_RATING_UNSPECIFIED: 0,
    ONE: 1,
    TWO: 2,
    THREE: 3,
    FOUR: 4,
    FIVE: 5,
  };
  return map[rating] ?? 0;
}

export function toReview(review: GbpReview): Review {
  return {
    id: review.reviewId,
    name: review.name,
    rating: starRatingToNumber(review.starRating),
    body: review.comment?.trim() ?? '',
    authorName: review.reviewer?.displayName?.trim() || DEFAULT_REVIEWER_NAME,
    createdAt: new Date(review.createTime),
    updatedAt: new Date(review.updateTime),
    existingReply: review.reviewReply
      ? {
          text: review.reviewReply.comment,
          updatedAt: new Date(review.reviewReply.updateTime),
        }
      : undefined,
  };
}
