import mongoose from 'mongoose';

import envKeys from './config/envKeys';
import app from './serverCommon';

// Connect to MongoDB, then start server
mongoose
    .connect(envKeys.MONGODB_URI)
    .then(() => {
        console.log('Connected to MongoDB');

        const PORT = envKeys.EXPRESS_PORT;
        app.listen(PORT, () => {
            console.log(`Server running on port http://localhost:${PORT}`)
        });
    })
    .catch((err) => {
        console.log('Error connecting to MongoDB', err);
        process.exit(1);
    });
