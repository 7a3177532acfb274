import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument, Types } from 'mongoose';

export const DESTINATION_STATUSES = ['active', 'inactive'] as const;
export type DestinationStatus = (typeof DESTINATION_STATUSES)[number];

export type DestinationDocument = HydratedDocument<Destination>;

@Schema({ timestamps: true })
export class Destination {
  _id!: Types.ObjectId;

  @Prop({ type: String, required: true, trim: true, index: true })
  name!: string;

  // 도/광역시, matched exactly against the KMA city's province
  @Prop({ type: String, required: true, index: true })
  province!: string;

  @Prop({ type: String, default: null, index: true })
  region?: string | null;

  @Prop({ type: String, default: null })
  category?: string | null;

  @Prop({ type: [String], default: [] })
  tags!: string[];

  @Prop({ type: Number, default: null })
  latitude?: number | null;

  @Prop({ type: Number, default: null })
  longitude?: number | null;

  @Prop({ type: Number, default: null, min: 0, max: 5 })
  rating?: number | null;

  @Prop({ type: Number, default: 0 })
  popularityScore!: number;

  @Prop({ type: String, default: null })
  imageUrl?: string | null;

  @Prop({ type: String, default: null })
  description?: string | null;

  @Prop({ type: Boolean, default: false })
  isIndoor!: boolean;

  @Prop({ type: String, enum: DESTINATION_STATUSES, default: 'active' })
  status!: DestinationStatus;

  createdAt?: Date;
  updatedAt?: Date;
}

export const DestinationSchema = SchemaFactory.createForClass(Destination);

DestinationSchema.index({ province: 1, status: 1 });
DestinationSchema.index({ popularityScore: -1 });
DestinationSchema.index({ name: 1, province: 1 }, { unique: true });
