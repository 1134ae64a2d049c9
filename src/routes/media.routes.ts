import { FastifyInstance } from 'fastify';
import {
    MediaController,
    type IdParams,
    type ListQuery,
    type SearchQuery,
    type UpdateBody
} from '../controllers/media.controller.js';
import userContext from '../plugins/user.context.js';
import type { Services } from '../types/stores.js';
import {
    deleteMediaSchema,
    getMediaSchema,
    listMediaSchema,
    searchMediaSchema,
    updateMediaSchema,
    uploadMediaSchema
} from './schemas/media.schema.js';

export async function mediaRoutes(app: FastifyInstance, { documents, blobs, config, credentials }: Services) {
    const mediaController = new MediaController(documents, blobs, config);

    // protected
    app.register(async function protectedMediaRoutes(app) {
        app.register(userContext, { credentials });

        // upload one file (multipart)
        app.post('/media',
            { schema: uploadMediaSchema },
            mediaController.upload.bind(mediaController)
        );

        // list caller's media (paginated, optional type filter)
        app.get<{ Querystring: ListQuery }>('/media',
            { schema: listMediaSchema },
            mediaController.findAllFromUser.bind(mediaController)
        );

        // search caller's media
        app.get<{ Querystring: SearchQuery }>('/media/search',
            { schema: searchMediaSchema },
            mediaController.search.bind(mediaController)
        );

        app.get<{ Params: IdParams }>('/media/:id',
            { schema: getMediaSchema },
            mediaController.findById.bind(mediaController)
        );

        // update description / tags
        app.put<{ Params: IdParams; Body: UpdateBody }>('/media/:id',
            { schema: updateMediaSchema },
            mediaController.update.bind(mediaController)
        );

        app.delete<{ Params: IdParams }>('/media/:id',
            { schema: deleteMediaSchema },
            mediaController.delete.bind(mediaController)
        );
    });
}
