export type CleaningServiceCreatePayload = {
  name: string;
  description?: string;
  beforeImage?: string;
  afterImage?: string;
  isPublished?: boolean;
};

export type CleaningServiceUpdatePayload = Partial<CleaningServiceCreatePayload>;

export type CleaningServiceResponse = {
  _id: string;
  name: string;
  description?: string;
  beforeImage?: string;
  afterImage?: string;
  isPublished: boolean;
  createdAt: Date;
  updatedAt: Date;
};
