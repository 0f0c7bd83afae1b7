import { z } from 'zod';

export const metadataTermLabelSchema = z.object({
    name: z.string().min(1, 'Term name is required'),
    namespace: z.string().min(1, 'Term namespace is required'),
    label: z.string().min(1, 'Term label is required'),
});

export const metadataTermsResourceSchema = z.object({
    terms: z.array(metadataTermLabelSchema),
});

export type MetadataTermLabel = z.infer<typeof metadataTermLabelSchema>;

export const agreementParametersInputSchema = z.object({
    datasetId: z.string().min(1, 'Dataset ID is required'),
    templateResourceDir: z.string().min(1).optional(),
    isSample: z.boolean().optional(),
});
