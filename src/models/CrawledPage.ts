import { Document, Schema, model } from 'mongoose';

export interface CrawledPageDocument extends Document {
  cdpId: string;
  url: string;
  title: string;
  rawText: string;
  fetchTime: Date;
  createdAt: Date;
  updatedAt: Date;
}

const crawledPageSchema = new Schema<CrawledPageDocument>(
  {
    cdpId: {
      type: String,
      required: true,
      trim: true,
      lowercase: true,
    },
    url: {
      type: String,
      required: true,
      trim: true,
    },
    title: {
      type: String,
      trim: true,
      default: '',
    },
    rawText: {
      type: String,
      required: true,
    },
    fetchTime: {
      type: Date,
      required: true,
    },
  },
  {
    timestamps: true,
  }
);

crawledPageSchema.index({ cdpId: 1, url: 1 }, { unique: true });

export const CrawledPage = model<CrawledPageDocument>('CrawledPage', crawledPageSchema);
